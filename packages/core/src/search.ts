/**
 * In-memory run search: filter, sort, paginate.
 *
 * Works on already materialized `Run` values. The store fetches a candidate
 * set and hands it to a `RunQueryEngine`; pushing the predicates into SQL
 * later only means supplying another engine.
 *
 * Filter grammar (clauses joined by AND, case-insensitive keywords):
 *
 *   clause     := identifier comparator value
 *   identifier := type "." key             type: metrics | params | tags | attributes
 *   key        := bare | `quoted` | "quoted"
 *   value      := number | 'string' | "string"
 *
 *   metrics.acc > 0.9 and params.optimizer = 'adam' and tags.`team name` LIKE 'vision%'
 */
import { Effect } from "effect";
import { InvalidArgumentError } from "./errors.js";
import type { OrderByClause, Run, RunPage } from "./types.js";

export const SEARCH_MAX_RESULTS_DEFAULT = 1000;
export const SEARCH_MAX_RESULTS_THRESHOLD = 50000;

// ── Types ──────────────────────────────────────────────────────────────────

export type EntityType = "metric" | "param" | "tag" | "attribute";

export type Comparator = "=" | "!=" | ">" | ">=" | "<" | "<=" | "LIKE" | "ILIKE";

export interface Identifier {
  readonly type: EntityType;
  readonly key: string;
}

export type Comparison =
  | (Identifier & { readonly kind: "numeric"; readonly comparator: Comparator; readonly value: number })
  | (Identifier & { readonly kind: "string"; readonly comparator: Comparator; readonly value: string });

export interface SortKey extends Identifier {
  readonly ascending: boolean;
}

export interface RunQuery {
  readonly filter?: string;
  readonly orderBy?: ReadonlyArray<OrderByClause | string>;
  readonly pageToken?: string;
  readonly maxResults: number;
}

export interface RunQueryEngine {
  apply(runs: readonly Run[], query: RunQuery): Effect.Effect<RunPage, InvalidArgumentError>;
}

const NUMERIC_COMPARATORS: readonly Comparator[] = ["=", "!=", ">", ">=", "<", "<="];
const STRING_COMPARATORS: readonly Comparator[] = ["=", "!=", "LIKE", "ILIKE"];

const STRING_ATTRIBUTES = ["run_id", "run_name", "status", "user_id", "artifact_uri"] as const;
const NUMERIC_ATTRIBUTES = ["start_time", "end_time"] as const;

type StringAttribute = (typeof STRING_ATTRIBUTES)[number];
type NumericAttribute = (typeof NUMERIC_ATTRIBUTES)[number];

const STRING_ATTRIBUTE_SET: ReadonlySet<string> = new Set(STRING_ATTRIBUTES);
const NUMERIC_ATTRIBUTE_SET: ReadonlySet<string> = new Set(NUMERIC_ATTRIBUTES);

function isStringAttribute(key: string): key is StringAttribute {
  return STRING_ATTRIBUTE_SET.has(key);
}

function isNumericAttribute(key: string): key is NumericAttribute {
  return NUMERIC_ATTRIBUTE_SET.has(key);
}

const ENTITY_ALIASES = new Map<string, EntityType>([
  ["metric", "metric"],
  ["metrics", "metric"],
  ["param", "param"],
  ["params", "param"],
  ["parameter", "param"],
  ["parameters", "param"],
  ["tag", "tag"],
  ["tags", "tag"],
  ["attribute", "attribute"],
  ["attributes", "attribute"],
  ["attr", "attribute"],
  ["run", "attribute"],
]);

// ── Scanner ────────────────────────────────────────────────────────────────

class Scanner {
  pos = 0;
  constructor(readonly src: string) {}

  get done(): boolean {
    return this.pos >= this.src.length;
  }

  skipSpace(): void {
    while (!this.done && /\s/.test(this.src[this.pos])) this.pos++;
  }

  /** Reads a case-insensitive keyword that ends at whitespace or input end. */
  keyword(word: string): boolean {
    const end = this.pos + word.length;
    if (this.src.slice(this.pos, end).toUpperCase() !== word) return false;
    if (end < this.src.length && !/\s/.test(this.src[end])) return false;
    this.pos = end;
    return true;
  }

  quoted(quotes: string): string | null {
    const q = this.src[this.pos];
    if (!quotes.includes(q)) return null;
    const close = this.src.indexOf(q, this.pos + 1);
    if (close < 0) throw new SyntaxError(`unterminated ${q} at position ${this.pos}`);
    const text = this.src.slice(this.pos + 1, close);
    this.pos = close + 1;
    return text;
  }

  /** Reads up to the next whitespace or any character in `stops`. */
  bare(stops: string): string {
    const start = this.pos;
    while (!this.done && !/\s/.test(this.src[this.pos]) && !stops.includes(this.src[this.pos])) this.pos++;
    return this.src.slice(start, this.pos);
  }
}

function readIdentifier(s: Scanner): Identifier {
  const start = s.pos;
  while (!s.done && /[A-Za-z]/.test(s.src[s.pos])) s.pos++;
  const prefix = s.src.slice(start, s.pos);
  const type = ENTITY_ALIASES.get(prefix.toLowerCase());
  if (type === undefined || s.src[s.pos] !== ".") {
    throw new SyntaxError(`expected metrics., params., tags. or attributes. at position ${start}`);
  }
  s.pos++;
  const key = s.quoted("`\"") ?? s.bare("=!<>");
  if (key.length === 0) throw new SyntaxError(`missing key after '${prefix}.'`);
  return { type, key };
}

function readComparator(s: Scanner): Comparator {
  for (const op of [">=", "<=", "!=", "=", ">", "<"] as const) {
    if (s.src.startsWith(op, s.pos)) {
      s.pos += op.length;
      return op;
    }
  }
  if (s.keyword("ILIKE")) return "ILIKE";
  if (s.keyword("LIKE")) return "LIKE";
  throw new SyntaxError(`expected a comparator at position ${s.pos}`);
}

function buildComparison(id: Identifier, comparator: Comparator, raw: { quoted: boolean; text: string }): Comparison {
  const numeric = id.type === "metric" || (id.type === "attribute" && isNumericAttribute(id.key));
  if (id.type === "attribute" && !numeric && !isStringAttribute(id.key)) {
    throw new SyntaxError(
      `invalid attribute key '${id.key}'; expected one of ${[...STRING_ATTRIBUTES, ...NUMERIC_ATTRIBUTES].join(", ")}`,
    );
  }
  if (numeric) {
    if (!NUMERIC_COMPARATORS.includes(comparator)) {
      throw new SyntaxError(`comparator '${comparator}' is not supported for numeric key '${id.key}'`);
    }
    const value = Number(raw.text);
    if (raw.quoted || raw.text.length === 0 || !Number.isFinite(value)) {
      throw new SyntaxError(`expected a numeric value for '${id.key}', got '${raw.text}'`);
    }
    return { ...id, kind: "numeric", comparator, value };
  }
  if (!STRING_COMPARATORS.includes(comparator)) {
    throw new SyntaxError(`comparator '${comparator}' is not supported for string key '${id.key}'`);
  }
  if (!raw.quoted) {
    throw new SyntaxError(`value for '${id.key}' must be a quoted string, got ${raw.text}`);
  }
  return { ...id, kind: "string", comparator, value: raw.text };
}

function syntaxToInvalid(what: string, input: string) {
  return (cause: unknown) =>
    new InvalidArgumentError({
      message: `Invalid ${what} '${input}': ${cause instanceof Error ? cause.message : String(cause)}`,
      cause,
    });
}

export function parseFilter(filter: string | undefined): Effect.Effect<readonly Comparison[], InvalidArgumentError> {
  if (filter === undefined || filter.trim() === "") return Effect.succeed([]);
  return Effect.try({
    try: () => {
      const s = new Scanner(filter);
      const clauses: Comparison[] = [];
      for (;;) {
        s.skipSpace();
        const id = readIdentifier(s);
        s.skipSpace();
        const comparator = readComparator(s);
        s.skipSpace();
        const quoted = s.quoted("'\"");
        const raw = quoted === null ? { quoted: false, text: s.bare("") } : { quoted: true, text: quoted };
        clauses.push(buildComparison(id, comparator, raw));
        s.skipSpace();
        if (s.done) return clauses;
        if (!s.keyword("AND")) throw new SyntaxError(`expected AND at position ${s.pos}`);
      }
    },
    catch: syntaxToInvalid("filter", filter),
  });
}

export function parseOrderBy(clause: OrderByClause | string): Effect.Effect<SortKey, InvalidArgumentError> {
  const text = typeof clause === "string" ? clause : clause.field;
  return Effect.try({
    try: () => {
      const s = new Scanner(text.trim());
      const id = readIdentifier(s);
      if (id.type === "attribute" && !isStringAttribute(id.key) && !isNumericAttribute(id.key)) {
        throw new SyntaxError(`invalid attribute key '${id.key}'`);
      }
      let ascending = typeof clause === "string" || clause.direction !== "DESC";
      s.skipSpace();
      if (typeof clause === "string" && !s.done) {
        if (s.keyword("DESC")) ascending = false;
        else if (!s.keyword("ASC")) throw new SyntaxError(`expected ASC or DESC at position ${s.pos}`);
        s.skipSpace();
      }
      if (!s.done) throw new SyntaxError(`unexpected input at position ${s.pos}`);
      return { ...id, ascending };
    },
    catch: syntaxToInvalid("order_by clause", text),
  });
}

// ── Evaluation ─────────────────────────────────────────────────────────────

function attributeValue(run: Run, key: string): string | number | null {
  const info = run.info;
  switch (key) {
    case "run_id": return info.runId;
    case "run_name": return info.runName;
    case "status": return info.status;
    case "user_id": return info.userId;
    case "artifact_uri": return info.artifactUri;
    case "start_time": return info.startTime;
    case "end_time": return info.endTime;
    default: return null;
  }
}

/** The value a run holds for an identifier, or null when it has none. */
export function lookupValue(run: Run, id: Identifier): string | number | null {
  switch (id.type) {
    case "metric": {
      const m = run.data.metrics.find((x) => x.key === id.key);
      if (m === undefined) return null;
      return m.isNan ? Number.NaN : m.value;
    }
    case "param":
      return run.data.params.find((x) => x.key === id.key)?.value ?? null;
    case "tag":
      return run.data.tags.find((x) => x.key === id.key)?.value ?? null;
    case "attribute":
      return attributeValue(run, id.key);
  }
}

function likeToRegExp(pattern: string, caseInsensitive: boolean): RegExp {
  let body = "";
  for (const ch of pattern) {
    if (ch === "%") body += ".*";
    else if (ch === "_") body += ".";
    else body += ch.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  }
  return new RegExp(`^${body}$`, caseInsensitive ? "is" : "s");
}

function compareNumbers(lhs: number, comparator: Comparator, rhs: number): boolean {
  switch (comparator) {
    case "=": return lhs === rhs;
    case "!=": return lhs !== rhs;
    case ">": return lhs > rhs;
    case ">=": return lhs >= rhs;
    case "<": return lhs < rhs;
    case "<=": return lhs <= rhs;
    case "LIKE":
    case "ILIKE":
      return false;
  }
}

function compareStrings(lhs: string, comparator: Comparator, rhs: string): boolean {
  switch (comparator) {
    case "=": return lhs === rhs;
    case "!=": return lhs !== rhs;
    case "LIKE": return likeToRegExp(rhs, false).test(lhs);
    case "ILIKE": return likeToRegExp(rhs, true).test(lhs);
    default: return false;
  }
}

export function matches(run: Run, clause: Comparison): boolean {
  const actual = lookupValue(run, clause);
  if (clause.kind === "numeric") {
    return typeof actual === "number" && compareNumbers(actual, clause.comparator, clause.value);
  }
  return typeof actual === "string" && compareStrings(actual, clause.comparator, clause.value);
}

export function filterRuns(runs: readonly Run[], filter: string | undefined): Effect.Effect<Run[], InvalidArgumentError> {
  return Effect.map(parseFilter(filter), (clauses) => runs.filter((run) => clauses.every((c) => matches(run, c))));
}

// ── Ordering ───────────────────────────────────────────────────────────────

type SortValue = string | number | null;

function sortValue(run: Run, key: SortKey): SortValue {
  const v = lookupValue(run, key);
  return typeof v === "number" && Number.isNaN(v) ? null : v;
}

/** Missing values go last whatever the direction. */
function compareValues(a: SortValue, b: SortValue, ascending: boolean): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  let order: number;
  if (typeof a === "number" && typeof b === "number") order = a < b ? -1 : a > b ? 1 : 0;
  else order = String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
  return ascending ? order : -order;
}

/** Newest first, then run id: every run has a distinct position. */
function tieBreak(a: Run, b: Run): number {
  const byStart = compareValues(a.info.startTime, b.info.startTime, false);
  if (byStart !== 0) return byStart;
  return a.info.runId < b.info.runId ? -1 : a.info.runId > b.info.runId ? 1 : 0;
}

export function sortRuns(
  runs: readonly Run[],
  orderBy: ReadonlyArray<OrderByClause | string> | undefined,
): Effect.Effect<Run[], InvalidArgumentError> {
  return Effect.map(Effect.forEach(orderBy ?? [], parseOrderBy), (keys) =>
    [...runs].sort((a, b) => {
      for (const key of keys) {
        const c = compareValues(sortValue(a, key), sortValue(b, key), key.ascending);
        if (c !== 0) return c;
      }
      return tieBreak(a, b);
    }),
  );
}

// ── Pagination ─────────────────────────────────────────────────────────────

export function encodePageToken(offset: number): string {
  return Buffer.from(JSON.stringify({ offset }), "utf-8").toString("base64");
}

export function decodePageToken(token: string | undefined): Effect.Effect<number, InvalidArgumentError> {
  if (token === undefined || token === "") return Effect.succeed(0);
  const bad = (cause?: unknown) =>
    new InvalidArgumentError({ message: `Invalid page token '${token}'. It could not be decoded to an offset.`, cause });
  return Effect.try({
    try: (): unknown => JSON.parse(Buffer.from(token, "base64").toString("utf-8")),
    catch: bad,
  }).pipe(
    Effect.flatMap((parsed) => {
      if (typeof parsed === "object" && parsed !== null && "offset" in parsed) {
        const offset = parsed.offset;
        if (typeof offset === "number" && Number.isInteger(offset) && offset >= 0) return Effect.succeed(offset);
      }
      return Effect.fail(bad());
    }),
  );
}

export function paginateRuns(
  runs: readonly Run[],
  pageToken: string | undefined,
  maxResults: number,
): Effect.Effect<RunPage, InvalidArgumentError> {
  return Effect.map(decodePageToken(pageToken), (offset) => {
    const end = offset + maxResults;
    const page = runs.slice(offset, end);
    return end < runs.length ? { runs: page, nextPageToken: encodePageToken(end) } : { runs: page };
  });
}

export const inMemoryRunQuery: RunQueryEngine = {
  apply: (runs, query) =>
    Effect.gen(function* () {
      const filtered = yield* filterRuns(runs, query.filter);
      const sorted = yield* sortRuns(filtered, query.orderBy);
      return yield* paginateRuns(sorted, query.pageToken, query.maxResults);
    }),
};
