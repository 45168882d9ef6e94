import { RenderError } from "../errors.js";
import type { ActionParams, ParamValue } from "../graph/types.js";
import type { OutcomeReader } from "./ledger.js";

export type RenderMode = "strict" | "lenient";

export type OutcomeReference = {
  source: "outcome";
  actionId: string;
  key: string;
  /** Token as written, e.g. `@{build.path}`. */
  raw: string;
};

/** `@{context.key}` or `@{env.NAME}`. */
export type NamespaceReference = { source: "context"; key: string; raw: string } | { source: "env"; key: string; raw: string };

export type Reference = OutcomeReference | NamespaceReference;

type Segment = { type: "text"; value: string } | { type: "ref"; ref: Reference };

// context values may reference each other
const MAX_DEPTH = 32;

/** The part of the dependency graph rendering needs. DependencyGraph satisfies it. */
export interface ReferenceScope {
  has(id: string): boolean;
  ancestors(id: string): ReadonlySet<string>;
}

export type RenderOptions = {
  /** Action whose parameters are being rendered. */
  actionId: string;
  mode: RenderMode;
  scope: ReferenceScope;
  /** Workflow context. Values may contain references themselves. */
  context?: Readonly<Record<string, string>>;
  /** Source of `@{env.NAME}`. Unset names render empty in both modes. */
  env?: Readonly<Record<string, string | undefined>>;
};

/**
 * Split a string into literal text and `@{action.key}`, `@{context.key}` or
 * `@{env.NAME}` references. `@@{` is the escape for a literal `@{`.
 */
export function tokenize(text: string): Segment[] {
  const segments: Segment[] = [];
  let literal = "";
  let i = 0;

  while (i < text.length) {
    if (text.startsWith("@@{", i)) {
      literal += "@{";
      i += 3;
      continue;
    }
    if (text.startsWith("@{", i)) {
      const close = text.indexOf("}", i + 2);
      if (close === -1) {
        throw new RenderError(
          "MalformedReference",
          `Unterminated reference at offset ${i}: "${text.slice(i)}"`,
          text.slice(i),
        );
      }
      const raw = text.slice(i, close + 1);
      if (literal) segments.push({ type: "text", value: literal });
      literal = "";
      segments.push({ type: "ref", ref: parseReference(raw, text.slice(i + 2, close)) });
      i = close + 1;
      continue;
    }
    literal += text[i];
    i++;
  }

  if (literal) segments.push({ type: "text", value: literal });
  return segments;
}

function parseReference(raw: string, body: string): Reference {
  const trimmed = body.trim();
  const dot = trimmed.indexOf(".");
  const head = dot === -1 ? "" : trimmed.slice(0, dot).trim();
  const key = dot === -1 ? "" : trimmed.slice(dot + 1).trim();
  if (!head || !key || /[\s@{]/.test(head)) {
    throw new RenderError("MalformedReference", `Malformed reference "${raw}" (expected @{<action>.<key>})`, raw);
  }
  if (head === "context" || head === "env") return { source: head, key, raw };
  return { source: "outcome", actionId: head, key, raw };
}

/** All references found in a parameter tree, in document order. */
export function findReferences(value: ParamValue): Reference[] {
  if (typeof value === "string") {
    return tokenize(value).flatMap((s) => (s.type === "ref" ? [s.ref] : []));
  }
  if (Array.isArray(value)) {
    return value.flatMap((v) => findReferences(v));
  }
  if (value !== null && typeof value === "object") {
    return Object.values(value).flatMap((v) => findReferences(v));
  }
  return [];
}

export function renderString(text: string, ledger: OutcomeReader, opts: RenderOptions): string {
  return renderText(text, ledger, opts, 0);
}

function renderText(text: string, ledger: OutcomeReader, opts: RenderOptions, depth: number): string {
  let out = "";
  for (const segment of tokenize(text)) {
    out += segment.type === "text" ? segment.value : resolve(segment.ref, ledger, opts, depth);
  }
  return out;
}

function lookup(values: Readonly<Record<string, string | undefined>> | undefined, key: string): string | undefined {
  return values !== undefined && Object.hasOwn(values, key) ? values[key] : undefined;
}

function resolve(ref: Reference, ledger: OutcomeReader, opts: RenderOptions, depth: number): string {
  switch (ref.source) {
    case "env":
      return lookup(opts.env, ref.key) ?? "";
    case "context": {
      const value = lookup(opts.context, ref.key);
      if (value === undefined) {
        throw new RenderError(
          "UnknownContextKey",
          `Reference "${ref.raw}" names unknown context key "${ref.key}"`,
          ref.raw,
        );
      }
      if (depth >= MAX_DEPTH) {
        throw new RenderError("RecursionLimit", `Reference "${ref.raw}" nests deeper than ${MAX_DEPTH} levels`, ref.raw);
      }
      return renderText(value, ledger, opts, depth + 1);
    }
    case "outcome":
      return resolveOutcome(ref, ledger, opts);
  }
}

function resolveOutcome(ref: OutcomeReference, ledger: OutcomeReader, opts: RenderOptions): string {
  if (!opts.scope.has(ref.actionId)) {
    throw new RenderError("UnknownAction", `Reference "${ref.raw}" names unknown action "${ref.actionId}"`, ref.raw);
  }
  // Only ancestors are guaranteed terminal when the reader renders.
  if (!opts.scope.ancestors(opts.actionId).has(ref.actionId)) {
    throw new RenderError(
      "UnrelatedAction",
      `Action "${opts.actionId}" references "${ref.raw}" but does not depend on "${ref.actionId}"`,
      ref.raw,
    );
  }
  const value = ledger.get(ref.actionId, ref.key);
  if (value !== undefined) return value;
  if (opts.mode === "strict") {
    throw new RenderError(
      "MissingOutcome",
      `Outcome "${ref.actionId}.${ref.key}" referenced by action "${opts.actionId}" is not available`,
      ref.raw,
    );
  }
  return "";
}

function renderValue(value: ParamValue, ledger: OutcomeReader, opts: RenderOptions): ParamValue {
  if (typeof value === "string") return renderString(value, ledger, opts);
  if (Array.isArray(value)) return value.map((v) => renderValue(v, ledger, opts));
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: ParamValue } = {};
    for (const [k, v] of Object.entries(value)) out[k] = renderValue(v, ledger, opts);
    return out;
  }
  return value;
}

/** Resolve every reference in an action's parameters. Throws RenderError. */
export function renderParams(raw: ActionParams, ledger: OutcomeReader, opts: RenderOptions): ActionParams {
  const out: ActionParams = {};
  for (const [k, v] of Object.entries(raw)) out[k] = renderValue(v, ledger, opts);
  return out;
}
