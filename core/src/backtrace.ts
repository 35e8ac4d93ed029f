/**
 * Backtrace facility.
 *
 * Captures are gated by the RUNTIME_BACKTRACE environment variable, read at
 * every capture: unset, empty or "0" disables collection.
 */

export const BACKTRACE_ENV_VAR = "RUNTIME_BACKTRACE";

const FRAME_RE = /^\s+at\s/;

export function isBacktraceEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[BACKTRACE_ENV_VAR];
  return value !== undefined && value !== "" && value !== "0";
}

/** Frame lines of a stack, after the first `headerLines` lines. */
function framesOf(stack: string | undefined, headerLines = 0): string[] {
  if (!stack) return [];
  return stack
    .split("\n")
    .slice(headerLines)
    .filter((line) => FRAME_RE.test(line))
    .map((line) => line.trim());
}

/**
 * An ordered, textual snapshot of the call stack.
 */
export class Backtrace {
  private readonly frames: readonly string[];

  private constructor(frames: string[]) {
    this.frames = Object.freeze(frames);
  }

  /**
   * Snapshot of the caller's stack. Returns undefined when collection is
   * disabled or the runtime recorded no frames.
   */
  static capture(): Backtrace | undefined {
    if (!isBacktraceEnabled()) return undefined;
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, Backtrace.capture);
    const frames = framesOf(holder.stack);
    return frames.length > 0 ? new Backtrace(frames) : undefined;
  }

  /** Frames of an existing error's stack, under the same gating as capture(). */
  static fromError(err: Error): Backtrace | undefined {
    if (!isBacktraceEnabled()) return undefined;
    // The header is "Name: message"; message lines may quote another stack.
    const frames = framesOf(err.stack, err.message.split("\n").length);
    return frames.length > 0 ? new Backtrace(frames) : undefined;
  }

  get depth(): number {
    return this.frames.length;
  }

  lines(): string[] {
    return [...this.frames];
  }

  toString(): string {
    return this.frames.join("\n");
  }
}
