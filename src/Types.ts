interface TimingPoint {
    time: number,
    beatLength: number,
    meter: number,
    sampleSet: number,
    sampleIndex: number,
    volume: number,
    uninherited: boolean,
    effects: number
}

interface HitObjectFields {
    x: number,
    y: number,
    time: number,
    type: number,
    hitSound: number,
    objectParams: string[],
    hitSample: string | undefined
}

interface DifficultySettings {
    readonly HPDrainRate: number,
    readonly CircleSize: number,
    readonly OverallDifficulty: number,
    readonly ApproachRate: number
}

interface MergeSpec {
    readonly inputDir: string,
    readonly outputOsu: string,
    readonly outputAudio: string,
    readonly difficulty: DifficultySettings,
    readonly version: string | undefined,
    readonly verbose: boolean
}

interface InputPair {
    readonly index: number,
    readonly beatmapPath: string,
    readonly audioPath: string
}

interface MergeResult {
    readonly outputOsu: string,
    readonly outputAudio: string,
    readonly mapCount: number,
    readonly offsets: readonly number[],
    readonly totalDuration: number
}

export type { TimingPoint, HitObjectFields, DifficultySettings, MergeSpec, InputPair, MergeResult };
