// src/utils/statusLine.ts
import { ProtocolParseError } from "../errors.js";

export interface StatusLine {
  version: string;
  code: number;
}

export function isStatusLine(line: string): boolean {
  return line.startsWith("HTTP/");
}

/** "HTTP/1.1 100 Continue" and friends. */
export function isInterimStatusLine(line: string): boolean {
  return /^HTTP\/\S+ 100(?:[ \r\n]|$)/.test(line);
}

/**
 * Split "HTTP/<version> <code> <reason>" on its first two spaces.
 * Throws ProtocolParseError when either separator is missing or the code is not numeric.
 */
export function parseStatusLine(line: string): StatusLine {
  const first = line.indexOf(" ");
  if (first < 0) throw new ProtocolParseError(line);

  const second = line.indexOf(" ", first + 1);
  if (second < 0) throw new ProtocolParseError(line);

  const rawCode = line.slice(first + 1, second);
  if (!/^\d+$/.test(rawCode)) throw new ProtocolParseError(line);

  return { version: line.slice(0, first), code: Number.parseInt(rawCode, 10) };
}
