/**
 * Utilities for creating optimized JSON schemas for LLM usage
 */

import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

export type JsonSchema = { [key: string]: unknown };

const SKIPPED_KEYS = new Set(["title", "$schema", "definitions", "$defs"]);

function isPlainObject(value: unknown): value is JsonSchema {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SchemaOptimizer {
	/**
	 * Render a zod schema as a flat JSON schema: every `$ref` inlined, titles
	 * and meta keys dropped, descriptions kept as written.
	 *
	 * With `strict`, every object also gets `additionalProperties: false`.
	 */
	static createOptimizedJsonSchema(
		schema: z.ZodTypeAny,
		options: { strict?: boolean } = {},
	): JsonSchema {
		const rendered: unknown = zodToJsonSchema(schema, {
			$refStrategy: "none",
			target: "jsonSchema7",
		});
		const optimized = SchemaOptimizer.optimize(rendered, options.strict ?? false);
		if (!isPlainObject(optimized)) {
			throw new Error("Optimized schema result is not an object");
		}
		return optimized;
	}

	private static optimize(node: unknown, strict: boolean): unknown {
		if (Array.isArray(node)) {
			return node.map((item) => SchemaOptimizer.optimize(item, strict));
		}
		if (!isPlainObject(node)) {
			return node;
		}

		const optimized: JsonSchema = {};
		for (const [key, value] of Object.entries(node)) {
			if (SKIPPED_KEYS.has(key) || key === "additionalProperties") {
				continue;
			}
			optimized[key] = SchemaOptimizer.optimize(value, strict);
		}

		if (strict && optimized.type === "object") {
			optimized.additionalProperties = false;
		}
		return optimized;
	}
}
