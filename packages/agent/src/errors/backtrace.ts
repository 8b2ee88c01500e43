export interface SourceLocation {
  file: string;
  line: number;
  column: number | null;
}

/**
 * A single frame of a normalized call stack
 */
export interface StackFrame {
  /** Function or method descriptor, or null for anonymous frames */
  function: string | null;

  /** Source location, or null when the runtime did not report one */
  location: SourceLocation | null;

  /** Arguments or other context captured with the frame */
  context?: Readonly<Record<string, unknown>>;
}

/**
 * Frame shape accepted from callers that collect stacks themselves
 * (e.g. from `Error.prepareStackTrace` call sites)
 */
export interface RawStackFrame {
  functionName?: string | null;
  fileName?: string | null;
  lineNumber?: number | null;
  columnNumber?: number | null;
  context?: Record<string, unknown>;
}

/**
 * A V8 stack string (`error.stack`) or frames listed innermost first
 */
export type StackInput = string | readonly RawStackFrame[];

const FRAME_PATTERN = /^\s*at (?:(.+?) \((.*)\)|(.+))$/;
const LOCATION_PATTERN = /^(.*?):(\d+)(?::(\d+))?$/;

/**
 * Convert a stack into frames, innermost first.
 *
 * Frames without a usable source location are kept with a null location so
 * the frame count matches what the runtime reported.
 */
export function parseStack(stack: StackInput): StackFrame[] {
  if (typeof stack === 'string') {
    return parseStackString(stack);
  }
  return stack.map(fromRawFrame);
}

/**
 * Render frames as backtrace lines, e.g. `handle (/srv/app.js:10:3)`
 */
export function formatBacktrace(frames: readonly StackFrame[]): string[] {
  return frames.map((frame) => {
    const fn = frame.function ?? '<anonymous>';
    if (!frame.location) {
      return `${fn} (<unknown>)`;
    }
    const { file, line, column } = frame.location;
    return column === null ? `${fn} (${file}:${line})` : `${fn} (${file}:${line}:${column})`;
  });
}

function parseStackString(stack: string): StackFrame[] {
  const frames: StackFrame[] = [];

  for (const line of stack.split('\n')) {
    const match = FRAME_PATTERN.exec(line);
    if (!match) {
      continue;
    }

    const [, functionName, wrappedLocation, bareLocation] = match;
    if (functionName !== undefined) {
      frames.push({ function: functionName, location: parseLocation(wrappedLocation ?? '') });
      continue;
    }

    // `at file:line:col` has no function; `at <anonymous>` has no location
    const location = parseLocation(bareLocation ?? '');
    frames.push(
      location ? { function: null, location } : { function: bareLocation ?? null, location: null }
    );
  }

  return frames;
}

function parseLocation(text: string): SourceLocation | null {
  const match = LOCATION_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, file, line, column] = match;
  if (!file) {
    return null;
  }

  return {
    file,
    line: Number(line),
    column: column === undefined ? null : Number(column),
  };
}

function fromRawFrame(raw: RawStackFrame): StackFrame {
  const location: SourceLocation | null =
    raw.fileName && typeof raw.lineNumber === 'number'
      ? { file: raw.fileName, line: raw.lineNumber, column: raw.columnNumber ?? null }
      : null;

  const frame: StackFrame = { function: raw.functionName || null, location };
  if (raw.context) {
    frame.context = Object.freeze({ ...raw.context });
  }
  return frame;
}
