import { Effect } from "effect";
import { ParseError } from "./Errors.js";
import type { TimingPoint } from "./Types.js";
import { FormatNumber, ParseInteger, ParseNumber } from "./Utils.js";

const TIMING_POINT_FIELDS = 8;

/**
 * Decode one `[TimingPoints]` line:
 * `time,beatLength,meter,sampleSet,sampleIndex,volume,uninherited,effects`
 */
const ParseTimingPoint = (line: string, source: string, lineNumber: number): Effect.Effect<TimingPoint, ParseError> => {
    const nodes: string[] = line.split(",");
    const fail = (message: string) =>
        Effect.fail(new ParseError({ source, line: lineNumber, message: `${source}:${lineNumber}: ${message}` }));

    if (nodes.length < TIMING_POINT_FIELDS)
        return fail(`timing point has ${nodes.length} fields, expected ${TIMING_POINT_FIELDS}`);

    const time = ParseInteger(nodes[0]);
    const beatLength = ParseNumber(nodes[1]);
    const meter = ParseInteger(nodes[2]);
    const sampleSet = ParseInteger(nodes[3]);
    const sampleIndex = ParseInteger(nodes[4]);
    const volume = ParseInteger(nodes[5]);
    const uninherited = ParseInteger(nodes[6]);
    const effects = ParseInteger(nodes[7]);

    if (
        time === undefined ||
        beatLength === undefined ||
        meter === undefined ||
        sampleSet === undefined ||
        sampleIndex === undefined ||
        volume === undefined ||
        uninherited === undefined ||
        effects === undefined
    )
        return fail(`timing point has a non-numeric field: "${line}"`);

    return Effect.succeed({
        time,
        beatLength,
        meter,
        sampleSet,
        sampleIndex,
        volume,
        uninherited: uninherited !== 0,
        effects,
    });
};

const SerializeTimingPoint = (point: TimingPoint): string =>
    [
        FormatNumber(point.time),
        FormatNumber(point.beatLength),
        FormatNumber(point.meter),
        FormatNumber(point.sampleSet),
        FormatNumber(point.sampleIndex),
        FormatNumber(point.volume),
        point.uninherited ? "1" : "0",
        FormatNumber(point.effects),
    ].join(",");

const ShiftTimingPoint = (point: TimingPoint, offset: number): TimingPoint => ({ ...point, time: point.time + offset });

// Slider velocity multiplier of an inherited point; uninherited points are 1x
const SliderVelocity = (point: TimingPoint): number =>
    point.uninherited || point.beatLength >= 0 ? 1 : -100 / point.beatLength;

export { TIMING_POINT_FIELDS, ParseTimingPoint, SerializeTimingPoint, ShiftTimingPoint, SliderVelocity };
