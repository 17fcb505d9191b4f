// `msg:` in any case, then a non-empty double-quoted value
const MSG_FIELD_PATTERN = /msg:"([^"]+)"/iu;

/**
 * Return the contents of the first `msg:"..."` field on the line, verbatim.
 * Lines without such a field yield `undefined`.
 */
export function extractMsg(line: string): string | undefined {
  return MSG_FIELD_PATTERN.exec(line)?.[1];
}

export function matchesServiceName(field: string, serviceName: string): boolean {
  return field.toLowerCase().includes(serviceName.toLowerCase());
}
