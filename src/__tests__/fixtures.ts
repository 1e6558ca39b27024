import { Effect } from "effect";
import type Beatmap from "../Beatmap.js";
import { ParseBeatmap } from "../Beatmap.js";

interface MapOptions {
    title?: string,
    difficulty?: string[],
    timingPoints?: string[],
    hitObjects?: string[],
    extra?: string[]
}

const SAMPLE_TIMING_POINTS: string[] = ["0,500,4,2,0,60,1,0", "1000,-50,4,2,0,60,0,0"];

const SAMPLE_HIT_OBJECTS: string[] = [
    "256,192,500,1,0,0:0:0:0:",
    "100,100,1000,2,0,B|200:100,1,140",
    "256,192,2000,12,0,3000,0:0:0:0:",
];

const SAMPLE_DIFFICULTY: string[] = [
    "HPDrainRate:5",
    "CircleSize:4",
    "OverallDifficulty:7",
    "ApproachRate:8",
    "SliderMultiplier:1.4",
    "SliderTickRate:1",
];

export const BuildMapText = (options: MapOptions = {}): string =>
    [
        "osu file format v14",
        "",
        "[General]",
        "AudioFilename: audio.mp3",
        "AudioLeadIn: 0",
        "Mode: 0",
        "",
        "[Metadata]",
        `Title:${options.title ?? "First Song"}`,
        "Artist:Someone",
        "Creator:tester",
        "Version:Hard",
        "BeatmapID:111",
        "BeatmapSetID:222",
        "",
        "[Difficulty]",
        ...(options.difficulty ?? SAMPLE_DIFFICULTY),
        "",
        "[Events]",
        "//Background and Video events",
        '0,0,"bg.jpg",0,0',
        "",
        ...(options.extra ?? []),
        "[TimingPoints]",
        ...(options.timingPoints ?? SAMPLE_TIMING_POINTS),
        "",
        "[HitObjects]",
        ...(options.hitObjects ?? SAMPLE_HIT_OBJECTS),
        "",
    ].join("\r\n");

export const ParseOrThrow = (text: string, source: string = "test.osu"): Beatmap => Effect.runSync(ParseBeatmap(text, source));
