import { Context, Effect, Layer } from "effect";
import ffmpeg from "fluent-ffmpeg";
import type { FfprobeData } from "fluent-ffmpeg";
import { AudioBackendError } from "./Errors.js";
import { DescribeCause } from "./Utils.js";

interface AudioBackendService {
    readonly durationMs: (file: string) => Effect.Effect<number, AudioBackendError>
    readonly concatenate: (files: readonly string[], output: string) => Effect.Effect<void, AudioBackendError>
}

class AudioBackend extends Context.Tag("AudioBackend")<AudioBackend, AudioBackendService>() {}

const CONCAT_LABEL = "merged";

/**
 * Audio-only concat graph. Cover art in the inputs shows up as a video stream, so every
 * input is selected by its `:a` stream and no video leg is built.
 */
const ConcatFilter = (inputCount: number): string => {
    const inputs: string = Array.from({ length: inputCount }, (_, idx) => `[${idx}:a]`).join("");
    return `${inputs}concat=n=${inputCount}:v=0:a=1[${CONCAT_LABEL}]`;
};

const ProbeDuration = (file: string): Effect.Effect<number, AudioBackendError> =>
    Effect.async<number, AudioBackendError>((resume) => {
        ffmpeg.ffprobe(file, (err: unknown, data: FfprobeData) => {
            if (err) {
                resume(Effect.fail(new AudioBackendError({ path: file, message: `${file}: ffprobe failed: ${DescribeCause(err)}`, cause: err })));
                return;
            }

            const seconds: number | undefined = data.format.duration;
            if (seconds === undefined || !Number.isFinite(seconds)) {
                resume(Effect.fail(new AudioBackendError({ path: file, message: `${file}: ffprobe reported no duration` })));
                return;
            }

            resume(Effect.succeed(Math.round(seconds * 1000)));
        });
    });

// Output container and codec follow the extension of `output`
const MergeFiles = (files: readonly string[], output: string): Effect.Effect<void, AudioBackendError> =>
    Effect.async<void, AudioBackendError>((resume) => {
        const command = files
            .reduce((cmd, file) => cmd.input(file), ffmpeg())
            .complexFilter(ConcatFilter(files.length), CONCAT_LABEL)
            .output(output);

        command
            .on("error", (error: Error) => {
                resume(Effect.fail(new AudioBackendError({ path: output, message: `${output}: ffmpeg failed: ${error.message}`, cause: error })));
            })
            .on("end", () => {
                resume(Effect.void);
            })
            .run();

        return Effect.sync(() => command.kill("SIGKILL"));
    });

const FfmpegAudioBackend: AudioBackendService = {
    durationMs: (file) =>
        ProbeDuration(file).pipe(Effect.tap((ms) => Effect.logDebug(`probed ${file}: ${ms}ms`))),
    concatenate: (files, output) =>
        MergeFiles(files, output).pipe(Effect.withLogSpan("ffmpeg.concatenate")),
};

const FfmpegAudioBackendLive = Layer.succeed(AudioBackend, FfmpegAudioBackend);

export { AudioBackend, ConcatFilter, FfmpegAudioBackend, FfmpegAudioBackendLive };
export type { AudioBackendService };
