export type CanonicalType = "string" | "number" | "boolean" | "object" | "unknown";

export const CANONICAL_TYPES: readonly CanonicalType[] = ["string", "number", "boolean", "object", "unknown"];

export type TypeAliases = Readonly<Record<string, CanonicalType>>;

const INTEGER_WIDTHS = ["8", "16", "32", "64", "128", "size"];

const BUILTIN_GROUPS: Record<Exclude<CanonicalType, "unknown">, string[]> = {
  string: ["string", "str", "&str", "&string", "&'static str", "text", "char", "uuid", "email", "url", "date", "datetime"],
  number: [
    "number",
    "integer",
    "int",
    "float",
    "double",
    "decimal",
    "long",
    "short",
    "bigint",
    "f32",
    "f64",
    ...INTEGER_WIDTHS.flatMap((w) => [`i${w}`, `u${w}`]),
  ],
  boolean: ["boolean", "bool"],
  object: ["object", "record", "map", "dict", "dictionary", "hashmap", "json", "{}"],
};

const BUILTIN_TABLE: ReadonlyMap<string, CanonicalType> = new Map(
  Object.entries(BUILTIN_GROUPS).flatMap(([canonical, tokens]) =>
    tokens.map((token): [string, CanonicalType] => [token, toCanonical(canonical)]),
  ),
);

function toCanonical(value: string): CanonicalType {
  return isCanonicalType(value) ? value : "unknown";
}

export function isCanonicalType(value: string): value is CanonicalType {
  return (CANONICAL_TYPES as readonly string[]).includes(value);
}

/**
 * Map a raw type token from either side to a canonical type.
 * Aliases win over the built-in table; unrecognised tokens are "unknown".
 */
export function normalize(raw: string, aliases: TypeAliases = {}): CanonicalType {
  const key = raw.trim().toLowerCase();
  if (!key) return "unknown";

  // canonical names always map to themselves, so normalize stays idempotent
  if (isCanonicalType(key)) return key;

  for (const [alias, canonical] of Object.entries(aliases)) {
    if (alias.trim().toLowerCase() === key) return canonical;
  }

  return BUILTIN_TABLE.get(key) ?? "unknown";
}

// unknown on either side never counts as a difference
export function typesDiffer(codeRaw: string, docRaw: string, aliases: TypeAliases = {}): boolean {
  const code = normalize(codeRaw, aliases);
  const doc = normalize(docRaw, aliases);
  if (code === "unknown" || doc === "unknown") return false;
  return code !== doc;
}
