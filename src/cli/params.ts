import type { FieldDescriptor } from "../schema";

/**
 * Parse repeated `--param key=value` flags into a values object plus a
 * matching ad-hoc schema (every field typed as string, first-seen order).
 * A repeated key keeps its last value.
 */
export function parseParamPairs(pairs: readonly string[]): {
  values: Record<string, string>;
  fields: FieldDescriptor[];
} {
  const values: Record<string, string> = {};
  const fields: FieldDescriptor[] = [];
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new Error(`Expected key=value, got "${pair}".`);
    }
    const key = pair.slice(0, eq);
    if (!fields.some((f) => f.name === key)) {
      fields.push({ name: key, type: "string", position: fields.length });
    }
    values[key] = pair.slice(eq + 1);
  }
  return { values, fields };
}
