/** Tokens that can show up somewhere the grammar does not allow them. */
export type MisplacedToken = "." | "-" | "/" | "whitespace" | "end of input";

/** Recoverable input problem; each one abandons the unit it occurred in. */
export type InputDiagnostic =
  | Readonly<{
      readonly _tag: "InvalidCharacter";
      readonly byte: number;
      readonly line: number;
    }>
  | Readonly<{
      readonly _tag: "MisplacedToken";
      readonly token: MisplacedToken;
      readonly line: number;
    }>
  | Readonly<{
      readonly _tag: "OctetOutOfRange";
      readonly line: number;
    }>
  | Readonly<{
      readonly _tag: "WidthOutOfRange";
      readonly line: number;
    }>
  | Readonly<{
      readonly _tag: "ReversedRange";
      readonly start: number;
      readonly end: number;
      readonly line: number;
    }>;

const hexByte = (byte: number): string => byte.toString(16).padStart(2, "0");

/** Message text without the program-name prefix. */
export const describeDiagnostic = (diagnostic: InputDiagnostic): string => {
  switch (diagnostic._tag) {
    case "InvalidCharacter":
      return `invalid character 0x${hexByte(diagnostic.byte)} in input`;
    case "MisplacedToken":
      return `${diagnostic.token} at an inappropriate place`;
    case "OctetOutOfRange":
      return "out-of-range number in input";
    case "WidthOutOfRange":
      return "out-of-range width in input";
    case "ReversedRange":
      return "invalid range (ends reversed)";
  }
};

/**
 * Render a diagnostic as one stderr line (no trailing newline).
 *
 * Invalid bytes are reported without a line number; everything else
 * carries the line the unit ended on.
 */
export const formatDiagnostic = (
  programName: string,
  diagnostic: InputDiagnostic,
): string =>
  diagnostic._tag === "InvalidCharacter"
    ? `${programName}: ${describeDiagnostic(diagnostic)}`
    : `${programName}: line ${diagnostic.line}: ${describeDiagnostic(diagnostic)}`;
