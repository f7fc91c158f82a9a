import { describe, expect, test } from "vitest";
import { z } from "zod";
import { SchemaOptimizer } from "../schema";

const Reply = z.object({
	name: z.string().describe("Who answered"),
	tags: z.array(z.string()).optional(),
	nested: z.object({ score: z.number() }),
});

describe("SchemaOptimizer", () => {
	test("should drop meta keys and keep descriptions", () => {
		expect(SchemaOptimizer.createOptimizedJsonSchema(Reply)).toEqual({
			type: "object",
			properties: {
				name: { type: "string", description: "Who answered" },
				tags: { type: "array", items: { type: "string" } },
				nested: {
					type: "object",
					properties: { score: { type: "number" } },
					required: ["score"],
				},
			},
			required: ["name", "nested"],
		});
	});

	test("should close every object in strict mode", () => {
		const schema = SchemaOptimizer.createOptimizedJsonSchema(Reply, { strict: true });
		expect(schema.additionalProperties).toBe(false);
		expect(schema).toHaveProperty(["properties", "nested", "additionalProperties"], false);
		expect(schema).not.toHaveProperty("$schema");
	});
});
