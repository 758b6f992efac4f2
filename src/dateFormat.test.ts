import { describe, test, expect } from "vitest";
import { compileDateFormat, formatTimestamp } from "./dateFormat";
import { DateFormatError } from "./errors";

describe("compileDateFormat", () => {
	test("parses the default strptime pattern", () => {
		const format = compileDateFormat("%Y-%m-%dT%H:%M:%S");
		expect(format.parse("2001-04-03T12:12:12")?.toISOString()).toBe("2001-04-03T12:12:12.000Z");
	});

	test("rejects text that does not match", () => {
		const format = compileDateFormat("%Y-%m-%dT%H:%M:%S");
		expect(format.parse("2001-04-03 12:12:12")).toBeUndefined();
		expect(format.parse("yesterday")).toBeUndefined();
	});

	test("rejects impossible dates", () => {
		const format = compileDateFormat("%Y-%m-%d");
		expect(format.parse("2023-02-29")).toBeUndefined();
		expect(format.parse("2023-13-01")).toBeUndefined();
		expect(format.parse("2024-02-29")?.toISOString()).toBe("2024-02-29T00:00:00.000Z");
	});

	test("supports month names, 12-hour clock and fractions", () => {
		const format = compileDateFormat("%d %b %Y %I:%M %p");
		expect(format.parse("05 Mar 2020 07:30 PM")?.toISOString()).toBe("2020-03-05T19:30:00.000Z");
		expect(format.parse("05 march 2020 12:00 am")?.toISOString()).toBe("2020-03-05T00:00:00.000Z");

		const withFraction = compileDateFormat("%H:%M:%S.%f");
		expect(withFraction.parse("01:02:03.25")?.toISOString()).toBe("1900-01-01T01:02:03.250Z");
	});

	test("reads SimpleDateFormat patterns", () => {
		const format = compileDateFormat("yyyy-MM-dd'T'HH:mm:ss");
		expect(format.parse("1999-12-31T23:59:58")?.toISOString()).toBe("1999-12-31T23:59:58.000Z");

		const shortYear = compileDateFormat("dd/MM/yy");
		expect(shortYear.parse("01/02/68")?.toISOString()).toBe("2068-02-01T00:00:00.000Z");
		expect(shortYear.parse("01/02/69")?.toISOString()).toBe("1969-02-01T00:00:00.000Z");
	});

	test("throws for unsupported directives", () => {
		expect(() => compileDateFormat("%Y %Z")).toThrow(DateFormatError);
		expect(() => compileDateFormat("yyyy G")).toThrow("pattern letter G is not supported");
	});
});

describe("formatTimestamp", () => {
	test("renders date and time", () => {
		expect(formatTimestamp(new Date(Date.UTC(2001, 3, 3, 12, 5, 9)))).toBe("2001-04-03 12:05:09");
	});

	test("adds milliseconds only when present", () => {
		expect(formatTimestamp(new Date(Date.UTC(2001, 3, 3, 12, 5, 9, 40)))).toBe("2001-04-03 12:05:09.040");
	});
});
