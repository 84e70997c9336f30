// ---- Flags parsing + typed accessors ---------------------------------------

export type Flags = Record<string, string>; // values are always strings

/** Parse --k=v and bare --k (as "true"). All values are strings. */
export function parseFlags(argv: string[] = []): Flags {
  const flags: Flags = {};
  for (const a of argv) {
    if (!a.startsWith('--')) continue;
    const m = /^--([^=]+)(?:=(.*))?$/.exec(a);
    if (!m) continue;
    const key = (m[1] ?? '').trim();
    const val = (m[2] ?? 'true').trim(); // bare --key => "true"
    if (key) flags[key] = val;
  }
  return flags;
}

/** Positional (non --flag) arguments in order. */
export function positionals(argv: string[] = []): string[] {
  return argv.filter((a) => !a.startsWith('--'));
}

/** Get a string flag (empty/whitespace → undefined). */
export function flagStr(flags: Flags, key: string): string | undefined {
  const v = flags[key];
  if (typeof v !== 'string') return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

/** Get a boolean flag. Accepts true/false/1/0/yes/no/on/off (case-insensitive). */
export function flagBool(flags: Flags, key: string): boolean {
  const v = flagStr(flags, key);
  if (v == null) return false;
  return /^(?:1|true|t|yes|y|on)$/i.test(v);
}

/** Split comma/space-separated value into array of non-empty tokens. */
export function splitCSV(s: string | undefined): string[] {
  if (!s) return [];
  return s
    .split(/[, \t\r\n]+/)
    .map((x) => x.trim())
    .filter(Boolean);
}

export const daysFrom = (now: Date, days: number) => new Date(now.getTime() + days * 86_400_000);
