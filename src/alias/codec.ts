/**
 * Serialization of a definition list to and from its stored string form.
 *
 * Older databases stored a bare command string per alias. Anything that does
 * not parse as a definition list is read as that legacy form: one global
 * definition whose command is the raw value.
 */

import { z } from "zod";
import type { AliasDefinition } from "./types";
import { GLOBAL_SCOPE } from "./scope";

const scopeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("global") }),
  z.object({ type: z.literal("exact"), path: z.string().min(1) }),
  z.object({ type: z.literal("recursive"), path: z.string().min(1) }),
]);

const definitionSchema = z.object({
  command: z.string(),
  scope: scopeSchema,
});

export const definitionListSchema = z.array(definitionSchema);

export function encodeDefinitions(definitions: AliasDefinition[]): string {
  return JSON.stringify(
    definitions.map(({ command, scope }) => ({ command, scope })),
  );
}

export function decodeDefinitions(raw: string): AliasDefinition[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [{ command: raw, scope: GLOBAL_SCOPE }];
  }
  const result = definitionListSchema.safeParse(parsed);
  if (!result.success) {
    return [{ command: raw, scope: GLOBAL_SCOPE }];
  }
  return result.data;
}
