import type Beatmap from "./Beatmap.js";
import { SerializeTimingPoint } from "./TimingPoint.js";

const EOL = "\r\n";
const SECTION_ORDER = ["General", "Editor", "Metadata", "Difficulty", "Events", "TimingPoints", "Colours", "HitObjects"] as const;

const SectionLines = (beatmap: Beatmap, name: string): string[] | undefined => {
    if (name === "TimingPoints") return beatmap.timingPoints.map(SerializeTimingPoint);
    if (name === "HitObjects") return beatmap.hitObjects.map((object) => object.toString());

    const lines: string[] | undefined = beatmap.sections.get(name);
    return lines === undefined || lines.length === 0 ? undefined : lines;
};

/**
 * Render a document back to `.osu` text. Known sections come first in the order the game writes
 * them, then any other section in the order it was read.
 */
const SerializeBeatmap = (beatmap: Beatmap): string => {
    const known: readonly string[] = SECTION_ORDER;
    const names: string[] = [...SECTION_ORDER, ...[...beatmap.sections.keys()].filter((name) => !known.includes(name))];
    const blocks: string[] = [];

    if (beatmap.preamble.length > 0) blocks.push(beatmap.preamble.join(EOL));

    for (const name of names) {
        const lines: string[] | undefined = SectionLines(beatmap, name);
        if (lines === undefined) continue;

        blocks.push([`[${name}]`, ...lines].join(EOL));
    }

    return blocks.join(EOL + EOL) + EOL;
};

export { EOL, SECTION_ORDER, SerializeBeatmap };
