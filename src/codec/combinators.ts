/**
 * Small parser combinators for the description text of feed records.
 *
 * A parser takes the unconsumed input and either returns the extracted value
 * with the remaining input, or a failure naming what it expected and what it
 * found. Parsers never look past the end of the current line unless their name
 * says so.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ParseResult<T> =
  | { ok: true; value: T; rest: string }
  | { ok: false; expected: string; found: string };

export type Parser<T> = (input: string) => ParseResult<T>;

const PREVIEW_LENGTH = 40;

function success<T>(value: T, rest: string): ParseResult<T> {
  return { ok: true, value, rest };
}

function failure<T>(expected: string, input: string): ParseResult<T> {
  return { ok: false, expected, found: input.slice(0, PREVIEW_LENGTH) };
}

function lineOf(input: string): string {
  const newline = input.indexOf("\n");
  return newline === -1 ? input : input.slice(0, newline);
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** Match a literal and return it. */
export function tag<L extends string>(literal: L): Parser<L> {
  return (input) =>
    input.startsWith(literal)
      ? success(literal, input.slice(literal.length))
      : failure(JSON.stringify(literal), input);
}

/** Match a literal and return a fixed value in its place. */
export function value<T>(literal: string, result: T): Parser<T> {
  return (input) =>
    input.startsWith(literal)
      ? success(result, input.slice(literal.length))
      : failure(JSON.stringify(literal), input);
}

/** Match one of several literals, longest first, returning the associated value. */
export function oneOf<T>(options: ReadonlyArray<readonly [string, T]>): Parser<T> {
  const sorted = [...options].sort((a, b) => b[0].length - a[0].length);
  const expected = sorted.map(([literal]) => JSON.stringify(literal)).join(" | ");
  return (input) => {
    for (const [literal, result] of sorted) {
      if (input.startsWith(literal)) {
        return success(result, input.slice(literal.length));
      }
    }
    return failure(expected, input);
  };
}

/** Non-empty run of ASCII digits. */
export const wholeNumber: Parser<number> = (input) => {
  const match = /^\d+/.exec(input);
  return match ? success(Number(match[0]), input.slice(match[0].length)) : failure("a number", input);
};

/** Optionally signed integer. */
export const integer: Parser<number> = (input) => {
  const match = /^-?\d+/.exec(input);
  return match ? success(Number(match[0]), input.slice(match[0].length)) : failure("an integer", input);
};

/** Optionally signed decimal number such as `-2` or `4.5`. */
export const decimal: Parser<number> = (input) => {
  const match = /^-?\d+(\.\d+)?/.exec(input);
  return match ? success(Number(match[0]), input.slice(match[0].length)) : failure("a decimal", input);
};

/**
 * Non-empty text up to the first `delimiter` on the current line, consuming the
 * delimiter. When the delimiter starts with a period and the text before it
 * also ends with one, the name keeps its own period (`Kaj Statter Jr.. hits`).
 */
export function takeUntil(delimiter: string): Parser<string> {
  return (input) => {
    const line = lineOf(input);
    let index = line.indexOf(delimiter);
    if (index === -1) {
      return failure(`text followed by ${JSON.stringify(delimiter)}`, input);
    }
    if (delimiter.startsWith(".") && line.startsWith(delimiter, index + 1)) {
      index += 1;
    }
    if (index === 0) {
      return failure(`text before ${JSON.stringify(delimiter)}`, input);
    }
    return success(input.slice(0, index), input.slice(index + delimiter.length));
  };
}

/** The rest of the current line, which must end with `suffix`; returns the text before it. */
export function lineEndingWith(suffix: string): Parser<string> {
  return (input) => {
    const line = lineOf(input);
    if (line.length <= suffix.length || !line.endsWith(suffix)) {
      return failure(`a line ending with ${JSON.stringify(suffix)}`, input);
    }
    return success(line.slice(0, line.length - suffix.length), input.slice(line.length));
  };
}

/** The rest of the current line, possibly empty. */
export const restOfLine: Parser<string> = (input) => {
  const line = lineOf(input);
  return success(line, input.slice(line.length));
};

/** Everything that is left, newlines included. */
export const restOfText: Parser<string> = (input) => success(input, "");

/** Succeeds only at the end of the input. */
export const eof: Parser<null> = (input) =>
  input.length === 0 ? success(null, input) : failure("end of text", input);

/** `Name's` or `Names'`, the way the feed writes possessives. */
export function possessiveOf(name: string): string {
  return name.endsWith("s") ? `${name}'` : `${name}'s`;
}

/**
 * A name written in possessive form and followed by a space: `Jaylen Hotdogfingers's `
 * is rejected, `Jaylen Hotdogfingers' ` and `York Silk's ` are accepted.
 */
export const possessive: Parser<string> = (input) => {
  const line = lineOf(input);
  for (let index = line.indexOf("'"); index > 0; index = line.indexOf("'", index + 1)) {
    const name = line.slice(0, index);
    const written = possessiveOf(name);
    if (line.startsWith(`${written} `)) {
      return success(name, input.slice(written.length + 1));
    }
  }
  return failure("a possessive name", input);
};

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export function map<A, B>(parser: Parser<A>, f: (value: A) => B): Parser<B> {
  return (input) => {
    const result = parser(input);
    return result.ok ? success(f(result.value), result.rest) : result;
  };
}

/** First parser that succeeds; failures are merged into one expectation. */
export function alt<T>(...parsers: Parser<T>[]): Parser<T> {
  return (input) => {
    const expected: string[] = [];
    for (const parser of parsers) {
      const result = parser(input);
      if (result.ok) {
        return result;
      }
      expected.push(result.expected);
    }
    return failure(expected.join(" or "), input);
  };
}

/** Two parsers in sequence. */
export function pair<A, B>(first: Parser<A>, second: Parser<B>): Parser<[A, B]> {
  return (input) => {
    const a = first(input);
    if (!a.ok) {
      return a;
    }
    const b = second(a.rest);
    return b.ok ? success<[A, B]>([a.value, b.value], b.rest) : b;
  };
}

export function opt<T>(parser: Parser<T>): Parser<T | null> {
  return (input) => {
    const result = parser(input);
    return result.ok ? result : success(null, input);
  };
}

export function preceded<T>(literal: string, parser: Parser<T>): Parser<T> {
  return (input) => {
    const head = tag(literal)(input);
    return head.ok ? parser(head.rest) : head;
  };
}

export function terminated<T>(parser: Parser<T>, literal: string): Parser<T> {
  return (input) => {
    const result = parser(input);
    if (!result.ok) {
      return result;
    }
    const tail = tag(literal)(result.rest);
    return tail.ok ? success(result.value, tail.rest) : tail;
  };
}

/** Zero or more repetitions; stops at the first failure or when no input is consumed. */
export function many0<T>(parser: Parser<T>): Parser<T[]> {
  return (input) => {
    const values: T[] = [];
    let rest = input;
    for (;;) {
      const result = parser(rest);
      if (!result.ok || result.rest.length === rest.length) {
        return success(values, rest);
      }
      values.push(result.value);
      rest = result.rest;
    }
  };
}

/** Run a parser over the whole input, which must be consumed completely. */
export function parseAll<T>(parser: Parser<T>, input: string): ParseResult<T> {
  const result = parser(input);
  if (!result.ok) {
    return result;
  }
  return result.rest.length === 0 ? result : failure("end of text", result.rest);
}
