/**
 * InputMachine.ts - byte-level state machine for address, range and prefix units
 *
 * Accepted units:
 *
 *   10.1.2.3               single address
 *   10.1.2.3 - 10.1.9.77   inclusive range (whitespace around `-` optional)
 *   10.1.2.0/24            prefix (whitespace around `/` optional)
 *
 * Phase walk for the three shapes (`.` steps over an Expect phase):
 *
 *   1 2 3 . 4 5 . 6 7 . 8 9 ␠        Octet1 → … → Octet4 → QuadPending
 *   … 8 9 ␠ - ␠ 1 1 . … . 4 4 ␠      QuadPending → RangeStart → RangeOctet1…4 → Start
 *   … 8 9 / 1 5 ␠                    Octet4 → WidthStart → Width → Start
 *
 * `value` holds the octet or width being accumulated. LATCHED (-1) marks the
 * current unit as abandoned: no further diagnostics, no commit. The latch
 * clears when a digit starts a fresh first quad.
 *
 * The machine is pure: every step returns the next state and the events it
 * produced, in order.
 */

import {
  ADDRESS_BITS,
  OCTET_MAX,
  appendOctet,
  normalizePrefix,
} from "../trie/address";
import type { InputDiagnostic, MisplacedToken } from "./Diagnostic";

/** Machine phases. */
export const InputPhase = {
  Start: "start",
  Octet1: "octet-1",
  Octet2Expect: "octet-2-expect",
  Octet2: "octet-2",
  Octet3Expect: "octet-3-expect",
  Octet3: "octet-3",
  Octet4Expect: "octet-4-expect",
  Octet4: "octet-4",
  QuadPending: "quad-pending",
  RangeStart: "range-start",
  RangeOctet1: "range-octet-1",
  RangeOctet2Expect: "range-octet-2-expect",
  RangeOctet2: "range-octet-2",
  RangeOctet3Expect: "range-octet-3-expect",
  RangeOctet3: "range-octet-3",
  RangeOctet4Expect: "range-octet-4-expect",
  RangeOctet4: "range-octet-4",
  WidthStart: "width-start",
  Width: "width",
} as const;

/** Union of machine phases. */
export type InputPhaseType = (typeof InputPhase)[keyof typeof InputPhase];

/** `value` while the current unit is abandoned. */
export const LATCHED = -1;

/** Scratch registers carried between bytes. */
export interface InputState {
  readonly phase: InputPhaseType;
  /** Quad being built, or the completed first quad. */
  readonly address: number;
  /** First address of a range. */
  readonly rangeStart: number;
  /** Octet or width being accumulated, or LATCHED. */
  readonly value: number;
  /** 1-based line number. */
  readonly line: number;
}

/** Completed unit or diagnostic produced by a step. */
export type InputEvent =
  | Readonly<{
      readonly _tag: "Address";
      readonly address: number;
      readonly line: number;
    }>
  | Readonly<{
      readonly _tag: "Range";
      readonly start: number;
      readonly end: number;
      readonly line: number;
    }>
  | Readonly<{
      readonly _tag: "Prefix";
      readonly address: number;
      readonly width: number;
      readonly line: number;
    }>
  | Readonly<{
      readonly _tag: "Diagnostic";
      readonly diagnostic: InputDiagnostic;
    }>;

/** Result of feeding one byte (or a chunk, or end of input). */
export interface InputStep {
  readonly state: InputState;
  readonly events: ReadonlyArray<InputEvent>;
}

/** State before any input has been read. */
export const initialInputState: InputState = {
  phase: InputPhase.Start,
  address: 0,
  rangeStart: 0,
  value: 0,
  line: 1,
};

const NoEvents: ReadonlyArray<InputEvent> = [];

const Byte = {
  Zero: 0x30,
  Nine: 0x39,
  Dot: 0x2e,
  Dash: 0x2d,
  Slash: 0x2f,
  Space: 0x20,
  Tab: 0x09,
  CarriageReturn: 0x0d,
  LineFeed: 0x0a,
} as const;

const digitsAfterExpect: ReadonlyMap<InputPhaseType, InputPhaseType> = new Map<
  InputPhaseType,
  InputPhaseType
>([
  [InputPhase.Octet2Expect, InputPhase.Octet2],
  [InputPhase.Octet3Expect, InputPhase.Octet3],
  [InputPhase.Octet4Expect, InputPhase.Octet4],
  [InputPhase.RangeOctet2Expect, InputPhase.RangeOctet2],
  [InputPhase.RangeOctet3Expect, InputPhase.RangeOctet3],
  [InputPhase.RangeOctet4Expect, InputPhase.RangeOctet4],
]);

const expectAfterDot: ReadonlyMap<InputPhaseType, InputPhaseType> = new Map<
  InputPhaseType,
  InputPhaseType
>([
  [InputPhase.Octet1, InputPhase.Octet2Expect],
  [InputPhase.Octet2, InputPhase.Octet3Expect],
  [InputPhase.Octet3, InputPhase.Octet4Expect],
  [InputPhase.RangeOctet1, InputPhase.RangeOctet2Expect],
  [InputPhase.RangeOctet2, InputPhase.RangeOctet3Expect],
  [InputPhase.RangeOctet3, InputPhase.RangeOctet4Expect],
]);

const isLatched = (state: InputState): boolean => state.value === LATCHED;

const idle = (state: InputState): InputStep => ({ state, events: NoEvents });

const report = (diagnostic: InputDiagnostic): InputEvent => ({
  _tag: "Diagnostic",
  diagnostic,
});

const commitAddress = (address: number, line: number): InputEvent => ({
  _tag: "Address",
  address,
  line,
});

const misplaced = (state: InputState, token: MisplacedToken): InputStep => ({
  state: { ...state, value: LATCHED },
  events: isLatched(state)
    ? NoEvents
    : [report({ _tag: "MisplacedToken", token, line: state.line })],
});

const accumulate = (
  state: InputState,
  phase: InputPhaseType,
  digit: number,
  limit: number,
  tag: "OctetOutOfRange" | "WidthOutOfRange",
): InputStep => {
  if (isLatched(state)) {
    return idle({ ...state, phase });
  }
  const value = state.value * 10 + digit;
  if (value > limit) {
    return {
      state: { ...state, phase, value: LATCHED },
      events: [report({ _tag: tag, line: state.line })],
    };
  }
  return idle({ ...state, phase, value });
};

const onDigit = (state: InputState, digit: number): InputStep => {
  switch (state.phase) {
    case InputPhase.Start:
      return idle({
        ...state,
        phase: InputPhase.Octet1,
        address: 0,
        value: digit,
      });
    case InputPhase.QuadPending:
      return {
        state: { ...state, phase: InputPhase.Octet1, address: 0, value: digit },
        events: isLatched(state)
          ? NoEvents
          : [commitAddress(state.address, state.line)],
      };
    case InputPhase.RangeStart:
      return idle({
        ...state,
        phase: InputPhase.RangeOctet1,
        address: 0,
        value: isLatched(state) ? LATCHED : digit,
      });
    case InputPhase.WidthStart:
      return idle({
        ...state,
        phase: InputPhase.Width,
        value: isLatched(state) ? LATCHED : digit,
      });
    case InputPhase.Width:
      return accumulate(
        state,
        InputPhase.Width,
        digit,
        ADDRESS_BITS,
        "WidthOutOfRange",
      );
    default:
      return accumulate(
        state,
        digitsAfterExpect.get(state.phase) ?? state.phase,
        digit,
        OCTET_MAX,
        "OctetOutOfRange",
      );
  }
};

const onDot = (state: InputState): InputStep => {
  if (state.phase === InputPhase.QuadPending) {
    // The quad before the whitespace is complete and is kept. The dot opens
    // a new, malformed unit that runs until the next whitespace.
    const dot = report({ _tag: "MisplacedToken", token: ".", line: state.line });
    return {
      state: { ...state, phase: InputPhase.Octet1, value: LATCHED },
      events: isLatched(state)
        ? [dot]
        : [commitAddress(state.address, state.line), dot],
    };
  }

  const next = expectAfterDot.get(state.phase);
  if (next === undefined) {
    return misplaced(state, ".");
  }
  if (isLatched(state)) {
    return idle({ ...state, phase: next });
  }
  return idle({
    ...state,
    phase: next,
    address: appendOctet(state.address, state.value),
    value: 0,
  });
};

const onDash = (state: InputState): InputStep => {
  switch (state.phase) {
    case InputPhase.Octet4:
      return idle({
        ...state,
        phase: InputPhase.RangeStart,
        rangeStart: isLatched(state)
          ? state.rangeStart
          : appendOctet(state.address, state.value),
      });
    case InputPhase.QuadPending:
      return idle({
        ...state,
        phase: InputPhase.RangeStart,
        rangeStart: state.address,
      });
    default:
      return misplaced(state, "-");
  }
};

const onSlash = (state: InputState): InputStep => {
  switch (state.phase) {
    case InputPhase.Octet4:
      return idle({
        ...state,
        phase: InputPhase.WidthStart,
        address: isLatched(state)
          ? state.address
          : appendOctet(state.address, state.value),
      });
    case InputPhase.QuadPending:
      return idle({ ...state, phase: InputPhase.WidthStart });
    default:
      return misplaced(state, "/");
  }
};

const onWhitespace = (state: InputState): InputStep => {
  switch (state.phase) {
    case InputPhase.Start:
    case InputPhase.QuadPending:
    case InputPhase.RangeStart:
    case InputPhase.WidthStart:
      return idle(state);
    case InputPhase.Octet4:
      return idle({
        ...state,
        phase: InputPhase.QuadPending,
        address: isLatched(state)
          ? state.address
          : appendOctet(state.address, state.value),
      });
    case InputPhase.RangeOctet4:
      return {
        state: { ...state, phase: InputPhase.Start },
        events: isLatched(state)
          ? NoEvents
          : [
              {
                _tag: "Range",
                start: state.rangeStart,
                end: appendOctet(state.address, state.value),
                line: state.line,
              },
            ],
      };
    case InputPhase.Width:
      return {
        state: { ...state, phase: InputPhase.Start },
        events: isLatched(state)
          ? NoEvents
          : [
              {
                _tag: "Prefix",
                address: normalizePrefix(state.address, state.value),
                width: state.value,
                line: state.line,
              },
            ],
      };
    default: {
      // Whitespace inside a quad. The latch stays set so a trailing `-` or
      // `/` of the same unit is swallowed rather than reported again.
      const step = misplaced(state, "whitespace");
      return { ...step, state: { ...step.state, phase: InputPhase.Start } };
    }
  }
};

// An invalid byte abandons the current unit, including a pending quad.
const onInvalid = (state: InputState, byte: number): InputStep => ({
  state: { ...state, phase: InputPhase.Octet1, value: LATCHED },
  events: [report({ _tag: "InvalidCharacter", byte, line: state.line })],
});

/** Feed one byte to the machine. */
export const stepInput = (state: InputState, byte: number): InputStep => {
  if (byte >= Byte.Zero && byte <= Byte.Nine) {
    return onDigit(state, byte - Byte.Zero);
  }
  switch (byte) {
    case Byte.Dot:
      return onDot(state);
    case Byte.Dash:
      return onDash(state);
    case Byte.Slash:
      return onSlash(state);
    case Byte.Space:
    case Byte.Tab:
    case Byte.CarriageReturn:
      return onWhitespace(state);
    case Byte.LineFeed: {
      // Count the line after the byte so commits and diagnostics triggered
      // by the newline carry the line the unit ended on.
      const step = onWhitespace(state);
      return {
        state: { ...step.state, line: step.state.line + 1 },
        events: step.events,
      };
    }
    default:
      return onInvalid(state, byte);
  }
};

/** Feed a chunk of bytes, collecting events in input order. */
export const scanChunk = (state: InputState, chunk: Uint8Array): InputStep => {
  let current = state;
  const events: Array<InputEvent> = [];
  for (const byte of chunk) {
    const step = stepInput(current, byte);
    current = step.state;
    for (const event of step.events) {
      events.push(event);
    }
  }
  return { state: current, events };
};

/**
 * Apply end of input. Pending quads, completed ranges and completed widths
 * are committed; any other unfinished unit is reported.
 */
export const finishInput = (state: InputState): InputStep => {
  const next: InputState = {
    ...initialInputState,
    line: state.line,
  };
  if (state.phase === InputPhase.Start || isLatched(state)) {
    return idle(next);
  }

  switch (state.phase) {
    case InputPhase.Octet4:
      return {
        state: next,
        events: [
          commitAddress(appendOctet(state.address, state.value), state.line),
        ],
      };
    case InputPhase.QuadPending:
      return {
        state: next,
        events: [commitAddress(state.address, state.line)],
      };
    case InputPhase.RangeOctet4:
    case InputPhase.Width: {
      // End of input closes these units exactly like whitespace does.
      const step = onWhitespace(state);
      return { state: next, events: step.events };
    }
    default:
      return {
        state: next,
        events: [
          report({
            _tag: "MisplacedToken",
            token: "end of input",
            line: state.line,
          }),
        ],
      };
  }
};
