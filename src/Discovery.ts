import { readdir } from "node:fs/promises";
import path from "node:path";
import { Effect } from "effect";
import { InputMismatchError, IOError } from "./Errors.js";
import type { InputPair } from "./Types.js";

const BEATMAP_EXTENSIONS: readonly string[] = [".osu"];
const AUDIO_EXTENSIONS: readonly string[] = [".mp3", ".ogg", ".wav"];
const NUMERIC_STEM = /^[0-9]+$/;

interface NumberedFile {
    number: number,
    name: string
}

// Files whose stem is not a plain number are not inputs, e.g. an earlier merged.osu
const CollectNumbered = (names: readonly string[], extensions: readonly string[]): NumberedFile[] =>
    names
        .filter((name) => extensions.includes(path.extname(name).toLowerCase()))
        .flatMap((name) => {
            const stem: string = path.basename(name, path.extname(name));
            return NUMERIC_STEM.test(stem) ? [{ number: parseInt(stem, 10), name }] : [];
        })
        .sort((a, b) => a.number - b.number);

const CheckSequence = (files: readonly NumberedFile[], kind: string, directory: string): Effect.Effect<void, InputMismatchError> => {
    for (const [idx, file] of files.entries()) {
        const expected: number = idx + 1;
        if (file.number === expected) continue;

        const message: string =
            file.number < expected
                ? `${directory}: ${kind} number ${file.number} appears more than once (${file.name})`
                : `${directory}: ${kind} files must be numbered 1..${files.length} without gaps, ${expected} is missing`;
        return Effect.fail(new InputMismatchError({ directory, message }));
    }

    return Effect.void;
};

/**
 * Pair `<n>.osu` with `<n>.<audio>` for `n = 1..N`.
 */
const PairInputs = (directory: string, names: readonly string[]): Effect.Effect<InputPair[], InputMismatchError> =>
    Effect.gen(function* () {
        const beatmaps: NumberedFile[] = CollectNumbered(names, BEATMAP_EXTENSIONS);
        const audio: NumberedFile[] = CollectNumbered(names, AUDIO_EXTENSIONS);

        if (beatmaps.length === 0)
            return yield* Effect.fail(new InputMismatchError({ directory, message: `${directory}: no numbered .osu files found` }));

        if (beatmaps.length !== audio.length)
            return yield* Effect.fail(
                new InputMismatchError({
                    directory,
                    message: `${directory}: found ${beatmaps.length} beatmap files but ${audio.length} audio files`,
                }),
            );

        yield* CheckSequence(beatmaps, "beatmap", directory);
        yield* CheckSequence(audio, "audio", directory);

        return beatmaps.map((beatmap, idx) => ({
            index: beatmap.number,
            beatmapPath: path.join(directory, beatmap.name),
            audioPath: path.join(directory, audio[idx]?.name ?? ""),
        }));
    });

const DiscoverInputs = (directory: string): Effect.Effect<InputPair[], InputMismatchError | IOError> =>
    Effect.tryPromise({
        try: () => readdir(directory),
        catch: (cause) => new IOError({ path: directory, message: `${directory}: cannot list input directory`, cause }),
    }).pipe(Effect.flatMap((names) => PairInputs(directory, names)));

export { BEATMAP_EXTENSIONS, AUDIO_EXTENSIONS, PairInputs, DiscoverInputs };
