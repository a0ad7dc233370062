/**
 * Path template compilation
 *
 * A template is literal text with `{name}` or `{name:type}` placeholders, e.g.
 * `/data/{country}/{company}/{year:int}_revenue.json`. `{{` and `}}` stand for
 * literal braces.
 *
 * Invariants:
 * - Placeholder names are unique within a template
 * - Literal text is matched verbatim (regex-escaped)
 * - String placeholders never span a "/" separator
 * - match(build(b)) deep-equals b for every well-typed binding b
 */

import { MissingKeyError, TemplateError, TypeMismatchError } from "./errors.js";
import type { Constraints, KeyBinding, PlaceholderType, Scalar } from "./types.js";

export type TemplateSegment =
  | { kind: "literal"; text: string }
  | { kind: "placeholder"; name: string; type: PlaceholderType };

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const TYPE_ALIASES: Record<string, PlaceholderType> = {
  "": "string",
  s: "string",
  str: "string",
  string: "string",
  d: "integer",
  int: "integer",
  integer: "integer",
  f: "float",
  g: "float",
  float: "float",
  number: "float",
};

const VALUE_PATTERNS: Record<PlaceholderType, string> = {
  string: "[^/]+?",
  integer: "[+-]?(?:0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|[0-9]+)",
  float: "[+-]?(?:(?:[0-9]+(?:\\.[0-9]*)?|\\.[0-9]+)(?:[eE][+-]?[0-9]+)?|[Ii]nf(?:inity)?|[Nn]a[Nn])",
};

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/**
 * Split a template into literal and placeholder segments
 */
function tokenize(template: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  const seen = new Set<string>();
  let literal = "";
  let i = 0;

  const flush = () => {
    if (literal) {
      segments.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  while (i < template.length) {
    const ch = template[i];

    if (ch === "{") {
      if (template[i + 1] === "{") {
        literal += "{";
        i += 2;
        continue;
      }
      const close = template.indexOf("}", i + 1);
      if (close === -1) {
        throw new TemplateError(template, `unbalanced "{" at offset ${i}`);
      }
      const body = template.slice(i + 1, close);
      if (body.includes("{")) {
        throw new TemplateError(template, `unbalanced "{" at offset ${i}`);
      }

      const colon = body.indexOf(":");
      const name = (colon === -1 ? body : body.slice(0, colon)).trim();
      const annotation = (colon === -1 ? "" : body.slice(colon + 1)).trim();

      if (!NAME_PATTERN.test(name)) {
        throw new TemplateError(template, `invalid placeholder name "${name}"`);
      }
      if (seen.has(name)) {
        throw new TemplateError(template, `placeholder "${name}" appears more than once`);
      }
      const type = Object.hasOwn(TYPE_ALIASES, annotation) ? TYPE_ALIASES[annotation] : undefined;
      if (!type) {
        throw new TemplateError(template, `unknown type "${annotation}" for placeholder "${name}"`);
      }

      seen.add(name);
      flush();
      segments.push({ kind: "placeholder", name, type });
      i = close + 1;
      continue;
    }

    if (ch === "}") {
      if (template[i + 1] === "}") {
        literal += "}";
        i += 2;
        continue;
      }
      throw new TemplateError(template, `unbalanced "}" at offset ${i}`);
    }

    literal += ch;
    i++;
  }

  flush();
  return segments;
}

/**
 * Parse the text captured for a placeholder
 * @returns The typed value, or undefined if it is not representable
 */
function parseValue(text: string, type: PlaceholderType): Scalar | undefined {
  if (type === "string") {
    return text;
  }

  const negative = text.startsWith("-");
  const unsigned = text.replace(/^[+-]/, "").toLowerCase();

  if (type === "integer") {
    let magnitude: number;
    if (unsigned.startsWith("0x")) {
      magnitude = Number.parseInt(unsigned.slice(2), 16);
    } else if (unsigned.startsWith("0o")) {
      magnitude = Number.parseInt(unsigned.slice(2), 8);
    } else if (unsigned.startsWith("0b")) {
      magnitude = Number.parseInt(unsigned.slice(2), 2);
    } else {
      magnitude = Number.parseInt(unsigned, 10);
    }
    if (!Number.isSafeInteger(magnitude)) {
      return undefined;
    }
    return negative && magnitude !== 0 ? -magnitude : magnitude;
  }

  let magnitude: number;
  if (unsigned === "inf" || unsigned === "infinity") {
    magnitude = Number.POSITIVE_INFINITY;
  } else if (unsigned === "nan") {
    magnitude = Number.NaN;
  } else {
    magnitude = Number(unsigned);
  }
  return negative ? -magnitude : magnitude;
}

/**
 * A compiled, immutable path template
 */
export class CompiledTemplate {
  readonly source: string;
  readonly segments: readonly TemplateSegment[];
  #types = new Map<string, PlaceholderType>();
  #regex: RegExp;

  constructor(source: string) {
    this.source = source;
    this.segments = Object.freeze(tokenize(source));

    let pattern = "";
    for (const segment of this.segments) {
      if (segment.kind === "literal") {
        pattern += escapeRegex(segment.text);
      } else {
        this.#types.set(segment.name, segment.type);
        pattern += `(?<${segment.name}>${VALUE_PATTERNS[segment.type]})`;
      }
    }
    this.#regex = new RegExp(`^${pattern}$`);
  }

  /**
   * Ordered placeholder names
   */
  placeholderNames(): readonly string[] {
    return [...this.#types.keys()];
  }

  /**
   * Declared type of a placeholder, or undefined if the template has none by that name
   */
  placeholderType(name: string): PlaceholderType | undefined {
    return this.#types.get(name);
  }

  has(name: string): boolean {
    return this.#types.has(name);
  }

  /**
   * Extract the binding encoded in a path
   * @returns The binding, or null if the path does not conform to the template
   */
  match(path: string): KeyBinding | null {
    const result = this.#regex.exec(path);
    if (!result) {
      return null;
    }

    const binding: KeyBinding = {};
    for (const [name, type] of this.#types) {
      const text = result.groups?.[name];
      if (text === undefined) {
        return null;
      }
      const value = parseValue(text, type);
      if (value === undefined) {
        return null;
      }
      binding[name] = value;
    }
    return binding;
  }

  /**
   * Build the concrete path for a full binding
   * Keys of the binding that are not placeholders are ignored.
   * @throws {MissingKeyError} If a placeholder has no value
   * @throws {TypeMismatchError} If a value does not fit its placeholder type
   */
  build(binding: Constraints): string {
    const missing = this.placeholderNames().filter(
      (name) => !Object.hasOwn(binding, name) || binding[name] === undefined
    );
    if (missing.length > 0) {
      throw new MissingKeyError(this.source, missing);
    }

    let path = "";
    for (const segment of this.segments) {
      path += segment.kind === "literal" ? segment.text : this.formatValue(segment.name, binding[segment.name]);
    }
    return path;
  }

  /**
   * Literal text before the first placeholder
   */
  globPrefix(): string {
    return this.prefixFor({});
  }

  /**
   * Literal prefix with leading constrained placeholders filled in
   *
   * Stops at the first placeholder the constraints leave open, and at the
   * first numeric one: "05", "+5" and "0x5" all parse to 5.
   */
  prefixFor(constraints: Constraints): string {
    let prefix = "";
    for (const segment of this.segments) {
      if (segment.kind === "literal") {
        prefix += segment.text;
        continue;
      }
      if (segment.type !== "string" || !Object.hasOwn(constraints, segment.name)) {
        break;
      }
      prefix += this.formatValue(segment.name, constraints[segment.name]);
    }
    return prefix;
  }

  /**
   * Deepest directory that contains every path the template can produce
   */
  rootFolder(): string {
    return directoryOf(this.globPrefix());
  }

  /**
   * Check a value against the declared type of a placeholder
   * @throws {TypeMismatchError} If the value does not fit
   */
  checkValue(name: string, value: Scalar | undefined): void {
    this.formatValue(name, value);
  }

  /**
   * Canonical text of a placeholder value
   */
  formatValue(name: string, value: Scalar | undefined): string {
    const type = this.#types.get(name);
    if (!type) {
      throw new TemplateError(this.source, `no placeholder named "${name}"`);
    }

    switch (type) {
      case "string":
        if (typeof value !== "string" || value === "" || value.includes("/")) {
          throw new TypeMismatchError(name, "a non-empty string without '/'", value);
        }
        return value;
      case "integer":
        if (typeof value !== "number" || !Number.isSafeInteger(value)) {
          throw new TypeMismatchError(name, "an integer", value);
        }
        return String(value);
      case "float":
        if (typeof value !== "number") {
          throw new TypeMismatchError(name, "a number", value);
        }
        return String(value);
    }
  }

  toString(): string {
    return this.source;
  }
}

/**
 * Directory part of a path prefix
 *
 * "/data/x_" gives "/data", "/x" gives "/" and "x" gives "" (the storage root).
 */
export function directoryOf(prefix: string): string {
  const slash = prefix.lastIndexOf("/");
  if (slash === -1) {
    return "";
  }
  return slash === 0 ? "/" : prefix.slice(0, slash);
}

/**
 * Join a directory and a relative path with exactly one "/" between them
 */
export function joinPath(dir: string, relative: string): string {
  if (dir === "") {
    return relative;
  }
  return dir.endsWith("/") ? `${dir}${relative}` : `${dir}/${relative}`;
}

/**
 * Compile a path template
 * @throws {TemplateError} On repeated names, unknown types or unbalanced braces
 */
export function compileTemplate(template: string): CompiledTemplate {
  return new CompiledTemplate(template);
}
