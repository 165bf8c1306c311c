import { z } from "zod";

/**
 * Convert a Zod schema to a TypeScript interface definition string with JSDoc comments.
 * Used to spell out the expected reply structure inside prompts.
 */
export function zodToTs(schema: z.ZodTypeAny, name: string): string {
  return `interface ${name} ${printNode(schema)}`;
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  let inner = schema;
  while (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
    inner = inner.unwrap();
  }
  return inner;
}

function printNode(schema: z.ZodTypeAny, indent = 0): string {
  const pad = "  ".repeat(indent);
  const inner = unwrap(schema);

  if (inner instanceof z.ZodString) {
    return "string";
  }
  if (inner instanceof z.ZodNumber) {
    return "number";
  }
  if (inner instanceof z.ZodBoolean) {
    return "boolean";
  }

  if (inner instanceof z.ZodArray) {
    const element: z.ZodTypeAny = inner.element;
    const itemType = printNode(element, indent);
    return unwrap(element) instanceof z.ZodEnum ||
      unwrap(element) instanceof z.ZodUnion
      ? `(${itemType})[]`
      : `${itemType}[]`;
  }

  if (inner instanceof z.ZodObject) {
    const shape: z.ZodRawShape = inner.shape;
    const lines = Object.entries(shape).map(([key, fieldSchema]) => {
      const description =
        fieldSchema.description ?? unwrap(fieldSchema).description;
      const fieldDesc = description ? `${pad}  /** ${description} */\n` : "";
      const optional = fieldSchema.isOptional() ? "?" : "";
      const typeStr = printNode(fieldSchema, indent + 1);

      return `${fieldDesc}${pad}  ${key}${optional}: ${typeStr};`;
    });
    return `{\n${lines.join("\n")}\n${pad}}`;
  }

  if (inner instanceof z.ZodEnum) {
    const options: readonly string[] = inner.options;
    return options.map((option) => `"${option}"`).join(" | ");
  }

  if (inner instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = inner.options;
    return options.map((option) => printNode(option, indent)).join(" | ");
  }

  if (inner instanceof z.ZodLiteral) {
    return JSON.stringify(inner.value);
  }

  return "unknown";
}
