import type Beatmap from "./Beatmap.js";

interface MetadataOverrides {
    audioFilename: string,
    version: string | undefined
}

/**
 * Point the merged map at the merged audio and give it its own identity, so the game does not
 * treat it as the first input map.
 */
const ApplyMetadata = (beatmap: Beatmap, overrides: MetadataOverrides): Beatmap => {
    const result: Beatmap = beatmap.clone();

    result.setValue("General", "AudioFilename", overrides.audioFilename, ": ");
    if (result.getValue("Metadata", "BeatmapID") !== undefined) result.setValue("Metadata", "BeatmapID", "0");
    if (overrides.version !== undefined) result.setValue("Metadata", "Version", overrides.version);

    return result;
};

export { ApplyMetadata };
export type { MetadataOverrides };
