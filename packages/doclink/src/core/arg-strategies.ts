import type { Arg, ArgStrategyKind, MarkdownToken } from "../types/index.js";

/**
 * The shapes an argument block can take inside a documentation section.
 * Each block of a section body is tried against them in this order.
 */
export interface ArgStrategy {
  kind: ArgStrategyKind;
  attempt(body: readonly MarkdownToken[]): Arg[] | null;
}

const IDENTIFIER = String.raw`[A-Za-z_$][\w$]*`;
const TYPE_TOKEN = /^[A-Za-z_&'{}][\w<>[\]|&.?,' {}]*$/;

const PARAM_COLUMN = ["param", "name", "arg"];
const TYPE_COLUMN = ["type"];
const DESC_COLUMN = ["desc"];

function findColumn(header: readonly string[], needles: readonly string[]): number {
  return header.findIndex((h) => {
    const lower = h.toLowerCase();
    return needles.some((n) => lower.includes(n));
  });
}

function stripTicks(value: string): string {
  return value.trim().replace(/^`+|`+$/g, "").trim();
}

function makeArg(name: string, type: string | undefined, description: string): Arg {
  const arg: Arg = { name, description: description.trim() };
  const cleanType = type !== undefined ? stripTicks(type) : "";
  if (cleanType) arg.type = cleanType;
  return arg;
}

export function parseTableRows(header: readonly string[], rows: readonly string[][]): Arg[] | null {
  const nameCol = findColumn(header, PARAM_COLUMN);
  if (nameCol === -1) return null;
  const typeCol = findColumn(header, TYPE_COLUMN);
  const descCol = findColumn(header, DESC_COLUMN);

  const args: Arg[] = [];
  for (const row of rows) {
    const name = stripTicks(row[nameCol] ?? "");
    if (!name) continue;
    const type = typeCol === -1 ? undefined : row[typeCol];
    const description = descCol === -1 ? "" : (row[descCol] ?? "");
    args.push(makeArg(name, type, description));
  }
  return args;
}

const tableStrategy: ArgStrategy = {
  kind: "table",
  attempt(body) {
    for (const token of body) {
      if (token.type !== "table") continue;
      const args = parseTableRows(token.header, token.rows);
      if (args && args.length > 0) return args;
    }
    return null;
  },
};

// `name` (`type`): description  |  `name`: description
const BACKTICKED_ITEM = new RegExp(
  String.raw`^\x60(${IDENTIFIER})\x60\s*(?:\(\s*\x60?([^)\x60]+?)\x60?\s*\))?\s*(?::|—|–|\s-\s)\s*([\s\S]*)$`,
);
// name (type): description
const BARE_PAREN_ITEM = new RegExp(String.raw`^(${IDENTIFIER})\s*\(\s*\x60?([^)\x60]+?)\x60?\s*\)\s*(?::|—|–|\s-\s)\s*([\s\S]*)$`);
// name: type: description  |  name: description
const BARE_COLON_ITEM = new RegExp(String.raw`^(${IDENTIFIER})\s*:\s*([\s\S]*)$`);

export function parseListItem(text: string): Arg | null {
  const item = text.trim();
  if (!item || item.startsWith("*")) return null;

  const ticked = BACKTICKED_ITEM.exec(item) ?? BARE_PAREN_ITEM.exec(item);
  if (ticked) {
    const [, name = "", type, description = ""] = ticked;
    return makeArg(name, type, description);
  }

  const bare = BARE_COLON_ITEM.exec(item);
  if (!bare) return null;
  const [, name = "", rest = ""] = bare;

  // a second colon after a single type-like token: `name: type: description`
  const typed = /^([^:\s]+)\s*:\s*([\s\S]*)$/.exec(rest);
  if (typed) {
    const [, type = "", description = ""] = typed;
    if (TYPE_TOKEN.test(stripTicks(type))) return makeArg(name, type, description);
  }
  return makeArg(name, undefined, rest);
}

const listStrategy: ArgStrategy = {
  kind: "list",
  attempt(body) {
    for (const token of body) {
      if (token.type !== "list") continue;
      const args = token.items.flatMap((item) => {
        const arg = parseListItem(item);
        return arg ? [arg] : [];
      });
      if (args.length > 0) return args;
    }
    return null;
  },
};

// term, optional (type) or `type`, delimiter, description
const DEFINITION_LINE = new RegExp(
  String.raw`^(?:\x60(${IDENTIFIER})\x60|(${IDENTIFIER}))\s*(?:\(\s*\x60?([^)\x60]+?)\x60?\s*\)|\x60([^\x60]+)\x60)?\s*(?::|—|–|\s-\s)\s*(.+)$`,
);

export function parseDefinitionLine(line: string): { arg: Arg; ticked: boolean } | null {
  const match = DEFINITION_LINE.exec(line.trim());
  if (!match) return null;
  const [, tickedName, bareName, parenType, tickedType, description = ""] = match;
  const name = tickedName ?? bareName;
  if (!name) return null;
  return { arg: makeArg(name, parenType ?? tickedType, description), ticked: tickedName !== undefined };
}

const definitionStrategy: ArgStrategy = {
  kind: "definition",
  attempt(body) {
    for (const token of body) {
      if (token.type !== "paragraph") continue;
      const lines = token.text.split("\n").filter((l) => l.trim().length > 0);
      if (lines.length === 0) continue;

      const parsed = lines.map(parseDefinitionLine);
      // every line of the block must be a definition
      if (!parsed.every((d) => d !== null)) continue;
      // a lone `Word: text` line is prose; bare terms need a second definition line
      if (parsed.length === 1 && !parsed[0]?.ticked) continue;
      return parsed.flatMap((d) => (d ? [d.arg] : []));
    }
    return null;
  },
};

export const ARG_STRATEGIES: readonly ArgStrategy[] = [tableStrategy, listStrategy, definitionStrategy];

// the first block, in body order, that some strategy can read is the argument block
export function extractArgs(body: readonly MarkdownToken[]): { args: Arg[]; strategy?: ArgStrategyKind } {
  for (const token of body) {
    for (const strategy of ARG_STRATEGIES) {
      const args = strategy.attempt([token]);
      if (args) return { args, strategy: strategy.kind };
    }
  }
  return { args: [] };
}
