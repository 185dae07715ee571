/** Parsed taskdeck:// URI */
export type ParsedResourceUri =
  | { kind: 'daily_summary' }
  | { kind: 'record'; id: string };
