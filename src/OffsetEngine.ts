import { Effect } from "effect";
import type Beatmap from "./Beatmap.js";
import { OffsetError } from "./Errors.js";
import { ShiftTimingPoint } from "./TimingPoint.js";

/**
 * Start time of every map on the merged timeline: map `i` starts after the audio of maps `0..i-1`.
 */
const ComputeOffsets = (durations: readonly number[], mapCount: number): Effect.Effect<number[], OffsetError> =>
    Effect.gen(function* () {
        if (mapCount === 0) return yield* Effect.fail(new OffsetError({ map: 0, message: "no beatmaps to merge" }));

        if (durations.length < mapCount) {
            const map: number = durations.length + 1;
            return yield* Effect.fail(new OffsetError({ map, message: `map ${map}: missing audio duration` }));
        }

        if (durations.length > mapCount) {
            const map: number = mapCount + 1;
            return yield* Effect.fail(
                new OffsetError({ map, message: `got ${durations.length} audio durations for ${mapCount} maps` }),
            );
        }

        const offsets: number[] = [];
        let cumulative: number = 0;

        for (let idx = 0; idx < mapCount; idx++) {
            const duration: number = durations[idx] ?? Number.NaN;
            const map: number = idx + 1;

            if (!Number.isFinite(duration) || duration < 0)
                return yield* Effect.fail(new OffsetError({ map, message: `map ${map}: invalid audio duration ${duration}` }));

            // a zero-length track would stack the next map on top of this one
            if (duration === 0 && idx < mapCount - 1)
                return yield* Effect.fail(new OffsetError({ map, message: `map ${map}: audio duration is zero but another map follows it` }));

            offsets.push(cumulative);
            cumulative += duration;
        }

        return offsets;
    });

/**
 * Concatenate the timing points and hit objects of `maps` in input order, each map shifted by its
 * offset. Every other section comes from the first map. Inputs are left untouched.
 */
const MergeBeatmaps = (maps: readonly Beatmap[], durations: readonly number[]): Effect.Effect<Beatmap, OffsetError> =>
    Effect.gen(function* () {
        const offsets: number[] = yield* ComputeOffsets(durations, maps.length);
        const [first] = maps;
        if (first === undefined) return yield* Effect.fail(new OffsetError({ map: 0, message: "no beatmaps to merge" }));

        const merged: Beatmap = first.clone();
        merged.timingPoints = maps.flatMap((map, idx) => map.timingPoints.map((point) => ShiftTimingPoint(point, offsets[idx] ?? 0)));
        merged.hitObjects = maps.flatMap((map, idx) => map.hitObjects.map((object) => object.shift(offsets[idx] ?? 0)));

        return merged;
    });

export { ComputeOffsets, MergeBeatmaps };
