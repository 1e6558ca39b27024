import type Beatmap from "./Beatmap.js";
import type { DifficultySettings } from "./Types.js";
import { FormatNumber } from "./Utils.js";

const OVERRIDDEN_KEYS = ["HPDrainRate", "CircleSize", "OverallDifficulty", "ApproachRate"] as const;

// Keys are matched exactly; "hpdrainrate" or "HP Drain Rate" lines are left alone.
const ApplyDifficulty = (beatmap: Beatmap, settings: DifficultySettings): Beatmap => {
    const result: Beatmap = beatmap.clone();
    for (const key of OVERRIDDEN_KEYS) result.setValue("Difficulty", key, FormatNumber(settings[key]));

    return result;
};

const ReadDifficulty = (beatmap: Beatmap): Partial<DifficultySettings> => {
    const settings: { -readonly [K in keyof DifficultySettings]?: number } = {};
    for (const key of OVERRIDDEN_KEYS) {
        const val: number | undefined = beatmap.getNumber("Difficulty", key);
        if (val !== undefined) settings[key] = val;
    }

    return settings;
};

export { OVERRIDDEN_KEYS, ApplyDifficulty, ReadDifficulty };
