export interface ParsedCustomId {
  prefix: string;
  /** Everything after the first colon, or null for a bare prefix */
  arg: string | null;
}

/** Split a component custom ID of the form `<prefix>:<arg>` */
export function parseCustomId(customId: string): ParsedCustomId {
  const separator = customId.indexOf(':');
  if (separator === -1) return { prefix: customId, arg: null };
  return {
    prefix: customId.slice(0, separator),
    arg: customId.slice(separator + 1),
  };
}

/** Positive integer argument (event or registration id), else null */
export function parseIdArg(arg: string | null): number | null {
  if (arg === null || !/^\d+$/.test(arg)) return null;
  const id = Number(arg);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
