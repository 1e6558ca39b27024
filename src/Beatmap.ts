import { Effect } from "effect";
import HitCircle from "./HitObjects/HitCircle.js";
import Slider from "./HitObjects/Slider.js";
import Spinner from "./HitObjects/Spinner.js";
import Hold from "./HitObjects/Hold.js";
import HitObject from "./HitObjects/HitObject.js";
import { ParseError } from "./Errors.js";
import { ParseTimingPoint } from "./TimingPoint.js";
import type { TimingPoint, HitObjectFields } from "./Types.js";
import { IsBlank, IsComment, ParseInteger, ParseNumber, SplitLines } from "./Utils.js";

const SECTION_HEADER = /^\[([A-Za-z0-9]+)\]$/;
const KEY_VALUE = /^([A-Za-z0-9_-]+)(\s*:\s*)(.*)$/;
const HIT_SAMPLE = /^-?[0-9]+:-?[0-9]+:-?[0-9]+(:.*)?$/;
const REQUIRED_SECTIONS = ["Difficulty", "TimingPoints", "HitObjects"] as const;
const DEFAULT_SLIDER_MULTIPLIER = 1.4;

const HitObjectType = {
    Circle: 1,
    Slider: 2,
    Spinner: 8,
    Hold: 128,
} as const;

interface BeatmapInit {
    source: string,
    preamble: string[],
    sections: Map<string, string[]>,
    timingPoints: TimingPoint[],
    hitObjects: HitObject[]
}

/**
 * One `.osu` document. Key/value and opaque sections keep their lines as written;
 * `[TimingPoints]` and `[HitObjects]` are held as decoded records.
 */
class Beatmap {
    public source: string;
    public preamble: string[];
    public sections: Map<string, string[]>;
    public timingPoints: TimingPoint[];
    public hitObjects: HitObject[];

    constructor(init: BeatmapInit) {
        this.source = init.source;
        this.preamble = init.preamble;
        this.sections = init.sections;
        this.timingPoints = init.timingPoints;
        this.hitObjects = init.hitObjects;
    }

    public getValue(section: string, key: string): string | undefined {
        for (const line of this.sections.get(section) ?? []) {
            const match = KEY_VALUE.exec(line);
            if (match?.[1] === key) return match[3]?.trim();
        }

        return undefined;
    }

    public getNumber(section: string, key: string): number | undefined {
        return ParseNumber(this.getValue(section, key));
    }

    /**
     * Replace the value of `key` in place, keeping the separator the line was written with,
     * or append `key<separator>value` when the key is absent.
     */
    public setValue(section: string, key: string, value: string, separator: string = ":"): void {
        const lines: string[] = this.sections.get(section) ?? [];
        if (!this.sections.has(section)) this.sections.set(section, lines);

        const idx: number = lines.findIndex((line) => KEY_VALUE.exec(line)?.[1] === key);
        if (idx === -1) {
            lines.push(`${key}${separator}${value}`);
            return;
        }

        const existingSeparator: string = KEY_VALUE.exec(lines[idx] ?? "")?.[2] ?? separator;
        lines[idx] = `${key}${existingSeparator}${value}`;
    }

    public get sliderMultiplier(): number {
        return this.getNumber("Difficulty", "SliderMultiplier") ?? DEFAULT_SLIDER_MULTIPLIER;
    }

    // Latest time touched by any object or timing point
    public contentEndTime(): number {
        const timing = { timingPoints: this.timingPoints, sliderMultiplier: this.sliderMultiplier };

        return Math.max(
            0,
            ...this.timingPoints.map((point) => point.time),
            ...this.hitObjects.map((object) => object.endTime(timing)),
        );
    }

    public clone(): Beatmap {
        return new Beatmap({
            source: this.source,
            preamble: [...this.preamble],
            sections: new Map([...this.sections].map(([name, lines]) => [name, [...lines]])),
            timingPoints: this.timingPoints.map((point) => ({ ...point })),
            hitObjects: this.hitObjects.map((object) => object.shift(0)),
        });
    }
}

const ParseHitObject = (line: string, source: string, lineNumber: number): Effect.Effect<HitObject, ParseError> => {
    const nodes: string[] = line.split(",");
    const fail = (message: string) =>
        Effect.fail(new ParseError({ source, line: lineNumber, message: `${source}:${lineNumber}: ${message}` }));

    if (nodes.length < 5) return fail(`hit object has ${nodes.length} fields, expected at least 5`);

    const x = ParseNumber(nodes[0]);
    const y = ParseNumber(nodes[1]);
    const time = ParseInteger(nodes[2]);
    const type = ParseInteger(nodes[3]);
    const hitSound = ParseInteger(nodes[4]);

    if (x === undefined || y === undefined || time === undefined || type === undefined || hitSound === undefined)
        return fail(`hit object has a non-numeric field: "${line}"`);

    const rest: string[] = nodes.slice(5);
    const base = { x, y, time, type, hitSound };

    if (type & HitObjectType.Hold) {
        const [field] = rest;
        if (rest.length !== 1 || field === undefined) return fail("hold note expects endTime:hitSample as its sixth field");

        const colon: number = field.indexOf(":");
        const endRaw: string = colon === -1 ? field : field.slice(0, colon);
        if (ParseInteger(endRaw) === undefined) return fail(`hold note has a non-numeric end time: "${endRaw}"`);

        return Effect.succeed(new Hold({ ...base, objectParams: [endRaw], hitSample: colon === -1 ? undefined : field.slice(colon + 1) }));
    }

    const last: string | undefined = rest.at(-1);
    const hasSample: boolean = last !== undefined && HIT_SAMPLE.test(last);
    const fields: HitObjectFields = {
        ...base,
        objectParams: hasSample ? rest.slice(0, -1) : rest,
        hitSample: hasSample ? last : undefined,
    };

    if (type & HitObjectType.Spinner) {
        if (ParseInteger(fields.objectParams[0]) === undefined) return fail("spinner is missing its end time");
        return Effect.succeed(new Spinner(fields));
    }

    if (type & HitObjectType.Slider) {
        if (fields.objectParams.length < 3) return fail(`slider has ${nodes.length} fields, expected at least 8`);
        if (ParseInteger(fields.objectParams[1]) === undefined || ParseNumber(fields.objectParams[2]) === undefined)
            return fail(`slider has a non-numeric slide count or length: "${line}"`);
        return Effect.succeed(new Slider(fields));
    }

    if (type & HitObjectType.Circle) return Effect.succeed(new HitCircle(fields));

    return fail(`hit object type ${type} has no circle, slider, spinner or hold bit`);
};

const ParseBeatmap = (text: string, source: string): Effect.Effect<Beatmap, ParseError> =>
    Effect.gen(function* () {
        const preamble: string[] = [];
        const sections = new Map<string, string[]>();
        const present = new Set<string>();
        const timingPoints: TimingPoint[] = [];
        const hitObjects: HitObject[] = [];

        let current: string | undefined;
        let body: string[] = [];

        const lines: string[] = SplitLines(text.replace(/^\uFEFF/, ""));
        for (const [idx, line] of lines.entries()) {
            const lineNumber: number = idx + 1;
            const header = SECTION_HEADER.exec(line.trim());

            if (header?.[1] !== undefined) {
                current = header[1];
                present.add(current);
                if (current !== "TimingPoints" && current !== "HitObjects") {
                    body = sections.get(current) ?? [];
                    sections.set(current, body);
                }
                continue;
            }

            if (current === undefined) {
                if (!IsBlank(line)) preamble.push(line.trim());
                continue;
            }

            if (current === "TimingPoints" || current === "HitObjects") {
                if (IsBlank(line) || IsComment(line)) continue;

                if (current === "TimingPoints") timingPoints.push(yield* ParseTimingPoint(line.trim(), source, lineNumber));
                else hitObjects.push(yield* ParseHitObject(line.trim(), source, lineNumber));
                continue;
            }

            body.push(line);
        }

        for (const name of REQUIRED_SECTIONS) {
            if (!present.has(name))
                return yield* Effect.fail(new ParseError({ source, line: undefined, message: `${source}: missing [${name}] section` }));
        }

        for (const sectionLines of sections.values()) {
            while (sectionLines.length > 0 && IsBlank(sectionLines[sectionLines.length - 1] ?? "")) sectionLines.pop();
        }

        return new Beatmap({ source, preamble, sections, timingPoints, hitObjects });
    });

/**
 * `.osu` files are UTF-8, but older ones were saved in Latin-1.
 */
const DecodeBeatmap = (bytes: Uint8Array): string => {
    try {
        return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch {
        return Buffer.from(bytes).toString("latin1");
    }
};

export default Beatmap;
export { ParseBeatmap, ParseHitObject, DecodeBeatmap, HitObjectType };
export type { BeatmapInit };
