/**
 * Options for {@link cleanText}.
 */
export interface CleanTextOptions {
  /**
   * Skip the technical-character whitelist and keep every printable character.
   * Chunk windows count UTF-16 code units, so a character outside the Basic Multilingual
   * Plane may be split across a window boundary.
   */
  keepAllCharacters?: boolean;
}

// Greek and Latin letters, digits, whitespace, ASCII punctuation and common math symbols
const DISALLOWED_CHARACTERS = /[^Α-Ωα-ωA-Za-z0-9\s.,;:!?(){}[\]"'=+\-*/<>%&#|~^@_\\∑∫≠≤≥→⇒∈∀∃π√]/g;
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F]/g;
const COMBINING_MARKS = /\p{M}/gu;
const HORIZONTAL_WHITESPACE = /[^\S\n]+/g;
const LINE_BREAKS = /\s*\n\s*/g;

/**
 * Normalizes raw extracted text before chunking. Runs once per document so that
 * chunk offsets refer to the cleaned text.
 */
export function cleanText(raw: string, options: CleanTextOptions = {}): string {
  if (!raw) {
    return "";
  }

  let text = raw.normalize("NFKD").replace(COMBINING_MARKS, "");
  if (!options.keepAllCharacters) {
    text = text.replace(DISALLOWED_CHARACTERS, "");
  }

  return text
    .replace(CONTROL_CHARACTERS, "")
    .replace(HORIZONTAL_WHITESPACE, " ")
    .replace(LINE_BREAKS, "\n")
    .trim();
}
