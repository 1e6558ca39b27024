import { open, rename, rm } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { Effect } from "effect";
import { AudioBackend } from "./Audio.js";
import Beatmap, { DecodeBeatmap, ParseBeatmap } from "./Beatmap.js";
import { ApplyDifficulty } from "./DifficultyOverride.js";
import { DiscoverInputs } from "./Discovery.js";
import { IOError } from "./Errors.js";
import type { MergeError, ParseError } from "./Errors.js";
import { ApplyMetadata } from "./MetadataOverride.js";
import { MergeBeatmaps } from "./OffsetEngine.js";
import { SerializeBeatmap } from "./Serializer.js";
import type { InputPair, MergeResult, MergeSpec } from "./Types.js";
import { DescribeCause, FormatDuration, Pad, Sum } from "./Utils.js";

const IOFailure = (file: string, action: string) => (cause: unknown) =>
    new IOError({ path: file, message: `${file}: cannot ${action}: ${DescribeCause(cause)}`, cause });

/**
 * Open `file`, run `use` on the handle and close it whatever `use` ends with.
 */
const WithFile = <A, E>(
    file: string,
    flags: string,
    use: (handle: FileHandle) => Effect.Effect<A, E>,
): Effect.Effect<A, E | IOError> =>
    Effect.acquireUseRelease(
        Effect.tryPromise({ try: () => open(file, flags), catch: IOFailure(file, "open") }),
        use,
        (handle) =>
            Effect.tryPromise({ try: () => handle.close(), catch: IOFailure(file, "close") }).pipe(
                Effect.catchAll((error) => Effect.logWarning(error.message)),
            ),
    );

const ReadBeatmapFile = (file: string): Effect.Effect<Beatmap, ParseError | IOError> =>
    WithFile(file, "r", (handle) =>
        Effect.tryPromise({ try: () => handle.readFile(), catch: IOFailure(file, "read") }).pipe(
            Effect.flatMap((bytes) => ParseBeatmap(DecodeBeatmap(bytes), file)),
        ),
    );

const WriteTextFile = (file: string, text: string): Effect.Effect<void, IOError> =>
    WithFile(file, "w", (handle) => Effect.tryPromise({ try: () => handle.writeFile(text, "utf8"), catch: IOFailure(file, "write") }));

const Rename = (from: string, to: string): Effect.Effect<void, IOError> =>
    Effect.tryPromise({ try: () => rename(from, to), catch: IOFailure(to, "replace") });

const RemoveFiles = (files: readonly string[]): Effect.Effect<void> =>
    Effect.forEach(
        files,
        (file) =>
            Effect.tryPromise({ try: () => rm(file, { force: true }), catch: IOFailure(file, "remove") }).pipe(
                Effect.catchAll((error) => Effect.logWarning(error.message)),
            ),
        { discard: true },
    );

// Sibling of the target that keeps its extension, so ffmpeg still picks the output format from it
const PartialPath = (target: string): string => {
    const ext: string = path.extname(target);
    return path.join(path.dirname(target), `.${path.basename(target, ext)}.partial${ext}`);
};

const LoadBeatmaps = (pairs: readonly InputPair[]): Effect.Effect<Beatmap[], ParseError | IOError> =>
    Effect.forEach(pairs, (pair) =>
        ReadBeatmapFile(pair.beatmapPath).pipe(
            Effect.tap((beatmap) =>
                Effect.logDebug(`${pair.beatmapPath}: ${beatmap.timingPoints.length} timing points, ${beatmap.hitObjects.length} hit objects`),
            ),
        ),
    );

/**
 * Discover the numbered inputs in `spec.inputDir`, merge them and write the merged beatmap and
 * audio. Both outputs are staged next to their targets and only renamed into place once
 * everything has succeeded.
 */
const RunMerge = (spec: MergeSpec): Effect.Effect<MergeResult, MergeError, AudioBackend> =>
    Effect.gen(function* () {
        const audio = yield* AudioBackend;
        const outputOsu: string = path.resolve(spec.outputOsu);
        const outputAudio: string = path.resolve(spec.outputAudio);

        const pairs: InputPair[] = yield* DiscoverInputs(spec.inputDir);
        yield* Effect.logInfo(`found ${pairs.length} beatmap/audio pairs in ${spec.inputDir}`);

        const beatmaps: Beatmap[] = yield* LoadBeatmaps(pairs);
        const durations: number[] = yield* Effect.forEach(pairs, (pair) => audio.durationMs(pair.audioPath));

        const merged: Beatmap = yield* MergeBeatmaps(beatmaps, durations);

        let offset: number = 0;
        for (const [idx, beatmap] of beatmaps.entries()) {
            const duration: number = durations[idx] ?? 0;
            const contentEnd: number = beatmap.contentEndTime();

            yield* Effect.logInfo(`${Pad(idx + 1, 3, true)}. ${path.basename(beatmap.source)} at ${FormatDuration(offset)} (${FormatDuration(duration)})`);
            if (contentEnd > duration && idx < beatmaps.length - 1)
                yield* Effect.logWarning(
                    `map ${idx + 1}: objects run until ${contentEnd}ms, past the end of its audio at ${duration}ms, and overlap map ${idx + 2}`,
                );
            offset += duration;
        }

        const output: Beatmap = ApplyMetadata(ApplyDifficulty(merged, spec.difficulty), {
            audioFilename: path.basename(outputAudio),
            version: spec.version,
        });
        const text: string = SerializeBeatmap(output);

        const partialAudio: string = PartialPath(outputAudio);
        const partialOsu: string = PartialPath(outputOsu);

        yield* Effect.gen(function* () {
            yield* audio.concatenate(
                pairs.map((pair) => pair.audioPath),
                partialAudio,
            );
            yield* WriteTextFile(partialOsu, text);
            // beatmap first: it is the cheaper half to take back if the audio cannot be moved
            yield* Rename(partialOsu, outputOsu);
            yield* Rename(partialAudio, outputAudio).pipe(Effect.onError(() => RemoveFiles([outputOsu])));
        }).pipe(Effect.onError(() => RemoveFiles([partialAudio, partialOsu])));

        yield* Effect.logInfo(`wrote ${outputOsu} and ${outputAudio} (${FormatDuration(offset)})`);

        return {
            outputOsu,
            outputAudio,
            mapCount: beatmaps.length,
            offsets: durations.map((_, idx) => Sum(durations.slice(0, idx))),
            totalDuration: Sum(durations),
        };
    }).pipe(Effect.annotateLogs("input", spec.inputDir));

export { RunMerge, ReadBeatmapFile, WriteTextFile, PartialPath };
