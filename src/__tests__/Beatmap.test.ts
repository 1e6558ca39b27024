import { Effect } from "effect";
import { describe, expect, test } from "vitest";
import { DecodeBeatmap, ParseBeatmap, ParseHitObject } from "../Beatmap.js";
import HitCircle from "../HitObjects/HitCircle.js";
import Hold from "../HitObjects/Hold.js";
import Slider from "../HitObjects/Slider.js";
import Spinner from "../HitObjects/Spinner.js";
import { SerializeBeatmap } from "../Serializer.js";
import { BuildMapText, ParseOrThrow } from "./fixtures.js";

const MinimalMap = (timingPoint: string = "0,500,4,2,0,60,1,0", hitObject: string = "256,192,500,1,0,0:0:0:0:"): string =>
    [
        "osu file format v14",
        "",
        "[General]",
        "AudioFilename: a.mp3",
        "",
        "[Difficulty]",
        "HPDrainRate:5",
        "",
        "[TimingPoints]",
        timingPoint,
        "",
        "[HitObjects]",
        hitObject,
        "",
    ].join("\r\n");

const parseError = (text: string, source: string) => Effect.runSync(Effect.flip(ParseBeatmap(text, source)));
const hitObject = (line: string) => Effect.runSync(ParseHitObject(line, "test.osu", 1));

describe("ParseBeatmap", () => {
    test("keeps the file format line as preamble", () => {
        expect(ParseOrThrow(BuildMapText()).preamble).toEqual(["osu file format v14"]);
    });

    test("reads key/value sections", () => {
        const beatmap = ParseOrThrow(BuildMapText());

        expect(beatmap.getValue("General", "AudioFilename")).toBe("audio.mp3");
        expect(beatmap.getValue("Metadata", "Title")).toBe("First Song");
        expect(beatmap.getNumber("Difficulty", "OverallDifficulty")).toBe(7);
        expect(beatmap.sliderMultiplier).toBe(1.4);
    });

    test("matches keys case-sensitively", () => {
        expect(ParseOrThrow(BuildMapText()).getValue("Difficulty", "hpdrainrate")).toBeUndefined();
    });

    test("keeps event lines verbatim, comments included", () => {
        expect(ParseOrThrow(BuildMapText()).sections.get("Events")).toEqual(["//Background and Video events", '0,0,"bg.jpg",0,0']);
    });

    test("decodes timing points", () => {
        const beatmap = ParseOrThrow(BuildMapText());

        expect(beatmap.timingPoints).toEqual([
            { time: 0, beatLength: 500, meter: 4, sampleSet: 2, sampleIndex: 0, volume: 60, uninherited: true, effects: 0 },
            { time: 1000, beatLength: -50, meter: 4, sampleSet: 2, sampleIndex: 0, volume: 60, uninherited: false, effects: 0 },
        ]);
    });

    test("truncates fractional timing point times", () => {
        expect(ParseOrThrow(MinimalMap("1000.5,500,4,2,0,60,1,0")).timingPoints[0]?.time).toBe(1000);
    });

    test("decodes hit objects by kind", () => {
        const [circle, slider, spinner] = ParseOrThrow(BuildMapText()).hitObjects;

        expect(circle).toBeInstanceOf(HitCircle);
        expect(slider).toBeInstanceOf(Slider);
        expect(spinner).toBeInstanceOf(Spinner);
        expect(circle?.fields).toEqual({ x: 256, y: 192, time: 500, type: 1, hitSound: 0, objectParams: [], hitSample: "0:0:0:0:" });
        expect(slider?.objectParams).toEqual(["B|200:100", "1", "140"]);
        expect(slider?.hitSample).toBeUndefined();
    });

    test("skips blank and comment lines between records", () => {
        const beatmap = ParseOrThrow(MinimalMap("// uninherited\r\n0,500,4,2,0,60,1,0\r\n"));

        expect(beatmap.timingPoints).toHaveLength(1);
    });

    test("fails on a timing point with fewer than 8 fields, naming file and line", () => {
        const error = parseError(MinimalMap("0,500,4,2,0"), "map.osu");

        expect(error._tag).toBe("ParseError");
        expect(error.source).toBe("map.osu");
        expect(error.line).toBe(10);
        expect(error.message).toBe("map.osu:10: timing point has 5 fields, expected 8");
    });

    test("fails on a non-numeric timing point field", () => {
        expect(parseError(MinimalMap("0,abc,4,2,0,60,1,0"), "map.osu").message).toBe(
            'map.osu:10: timing point has a non-numeric field: "0,abc,4,2,0,60,1,0"',
        );
    });

    test("fails on a hit object with fewer than 5 fields", () => {
        expect(parseError(MinimalMap(undefined, "256,192,500,1"), "map.osu").message).toBe(
            "map.osu:13: hit object has 4 fields, expected at least 5",
        );
    });

    test("fails when a required section is missing", () => {
        const text = MinimalMap().replace(/\[HitObjects\][\s\S]*$/, "");
        const error = parseError(text, "map.osu");

        expect(error.line).toBeUndefined();
        expect(error.message).toBe("map.osu: missing [HitObjects] section");
    });

    test("fails without a difficulty section", () => {
        const text = MinimalMap().replace("[Difficulty]\r\nHPDrainRate:5\r\n\r\n", "");

        expect(parseError(text, "map.osu").message).toBe("map.osu: missing [Difficulty] section");
    });

    test("accepts LF line endings", () => {
        const beatmap = ParseOrThrow(BuildMapText().replace(/\r\n/g, "\n"));

        expect(beatmap.hitObjects).toHaveLength(3);
        expect(beatmap.getValue("Metadata", "Artist")).toBe("Someone");
    });

    test("ends at the spinner end, the latest object", () => {
        expect(ParseOrThrow(BuildMapText()).contentEndTime()).toBe(3000);
    });
});

describe("hit objects", () => {
    test("hold notes keep end time and hit sample in one field", () => {
        const hold = hitObject("64,192,1000,128,0,1500:0:0:0:0:");

        expect(hold).toBeInstanceOf(Hold);
        expect(hold.objectParams).toEqual(["1500"]);
        expect(hold.hitSample).toBe("0:0:0:0:");
        expect(hold.toString()).toBe("64,192,1000,128,0,1500:0:0:0:0:");
        expect(hold.shift(100).toString()).toBe("64,192,1100,128,0,1600:0:0:0:0:");
    });

    test("spinners shift their end time with their start", () => {
        const spinner = hitObject("256,192,2000,12,0,3000,0:0:0:0:");

        expect(spinner.shift(500).toString()).toBe("256,192,2500,12,0,3500,0:0:0:0:");
        expect(spinner.toString()).toBe("256,192,2000,12,0,3000,0:0:0:0:");
    });

    test("sliders shift only their head time", () => {
        const slider = hitObject("100,100,1000,6,0,P|150:150|200:100,2,140,2|0|0,0:0|0:0|0:0,0:0:0:0:");

        expect(slider.shift(250).toString()).toBe("100,100,1250,6,0,P|150:150|200:100,2,140,2|0|0,0:0|0:0|0:0,0:0:0:0:");
    });

    test("slider end follows beat length and slider velocity", () => {
        const beatmap = ParseOrThrow(BuildMapText());
        const timing = { timingPoints: beatmap.timingPoints, sliderMultiplier: beatmap.sliderMultiplier };

        // 500ms beats at 2x velocity: 140px / (1.4 * 100 * 2) beats = 250ms
        expect(beatmap.hitObjects[1]?.endTime(timing)).toBe(1250);
    });

    test("spinner without an end time is rejected", () => {
        expect(Effect.runSync(Effect.flip(ParseHitObject("256,192,2000,8,0", "test.osu", 7))).message).toBe(
            "test.osu:7: spinner is missing its end time",
        );
    });

    test("objects without a kind bit are rejected", () => {
        expect(Effect.runSync(Effect.flip(ParseHitObject("256,192,2000,4,0", "test.osu", 3))).message).toBe(
            "test.osu:3: hit object type 4 has no circle, slider, spinner or hold bit",
        );
    });
});

describe("SerializeBeatmap", () => {
    test("reproduces a canonical file exactly", () => {
        const text = MinimalMap();

        expect(SerializeBeatmap(ParseOrThrow(text))).toBe(text);
    });

    test("preserves every record field through a round trip", () => {
        const original = ParseOrThrow(BuildMapText());
        const reparsed = ParseOrThrow(SerializeBeatmap(original));

        expect(reparsed.timingPoints).toEqual(original.timingPoints);
        expect(reparsed.hitObjects.map((object) => object.fields)).toEqual(original.hitObjects.map((object) => object.fields));
        expect(reparsed.sections).toEqual(original.sections);
    });

    test("writes CRLF even for LF input", () => {
        const text = MinimalMap();

        expect(SerializeBeatmap(ParseOrThrow(text.replace(/\r\n/g, "\n")))).toBe(text);
    });

    test("places Colours before HitObjects and unknown sections last", () => {
        const text = BuildMapText({ extra: ["[Custom]", "Key:Value", "", "[Colours]", "Combo1 : 255,0,0", ""] });
        const headers = SerializeBeatmap(ParseOrThrow(text))
            .split("\r\n")
            .filter((line) => line.startsWith("["));

        expect(headers).toEqual(["[General]", "[Metadata]", "[Difficulty]", "[Events]", "[TimingPoints]", "[Colours]", "[HitObjects]", "[Custom]"]);
    });
});

describe("DecodeBeatmap", () => {
    test("reads UTF-8", () => {
        expect(DecodeBeatmap(new Uint8Array([0x54, 0xc3, 0xa9]))).toBe("Té");
    });

    test("falls back to Latin-1 for invalid UTF-8", () => {
        expect(DecodeBeatmap(new Uint8Array([0x54, 0xe9]))).toBe("Té");
    });
});
