import type { Attribute } from "./model.js";
import { assertNever } from "./rowParser.js";

export type JsonSchema = {
	readonly $schema: string;
	readonly title: string;
	readonly type: string;
	readonly properties: Record<string, unknown>;
	readonly required: readonly string[];
	readonly additionalProperties: boolean;
};

/**
 * Generate a JSON Schema describing one row of the relation as emitted by JsonLinesFormatter.
 * Every attribute is present; missing values are null.
 */
export function generateJsonSchema(relation: string, attributes: readonly Attribute[]): JsonSchema {
	const properties: Record<string, unknown> = {};

	for (const attribute of attributes) {
		properties[attribute.name] = attributeToJsonSchemaType(attribute);
	}

	return {
		$schema: "http://json-schema.org/draft-07/schema#",
		title: relation,
		type: "object",
		properties,
		required: attributes.map(attribute => attribute.name),
		additionalProperties: false,
	};
}

function attributeToJsonSchemaType(attribute: Attribute): Record<string, unknown> {
	switch (attribute.type) {
		case "numeric":
		case "real":
			return { type: ["number", "null"] };
		case "integer":
			return { type: ["integer", "null"] };
		case "string":
			return { type: ["string", "null"] };
		case "date":
			return { type: ["string", "null"], format: "date-time" };
		case "nominal":
			return { enum: [...attribute.acceptedValues, null] };
		default:
			return assertNever(attribute);
	}
}
