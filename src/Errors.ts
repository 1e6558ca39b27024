import { Data } from "effect";

/**
 * Input directory does not hold a consecutive `1..N` set of beatmap/audio pairs.
 */
export class InputMismatchError extends Data.TaggedError("InputMismatchError")<{
    readonly directory: string,
    readonly message: string
}> {}

/**
 * A beatmap file is missing a required section or holds a malformed record.
 * `line` is 1-based and absent for section-level problems.
 */
export class ParseError extends Data.TaggedError("ParseError")<{
    readonly source: string,
    readonly line: number | undefined,
    readonly message: string
}> {}

/**
 * Audio durations cannot place map `map` (1-based) on the merged timeline.
 */
export class OffsetError extends Data.TaggedError("OffsetError")<{
    readonly map: number,
    readonly message: string
}> {}

export class AudioBackendError extends Data.TaggedError("AudioBackendError")<{
    readonly path: string,
    readonly message: string,
    readonly cause?: unknown
}> {}

export class IOError extends Data.TaggedError("IOError")<{
    readonly path: string,
    readonly message: string,
    readonly cause?: unknown
}> {}

export class UsageError extends Data.TaggedError("UsageError")<{
    readonly message: string
}> {}

export type MergeError = InputMismatchError | ParseError | OffsetError | AudioBackendError | IOError;
