export { default as Beatmap, ParseBeatmap, ParseHitObject, DecodeBeatmap, HitObjectType } from "./Beatmap.js";
export { default as HitObject } from "./HitObjects/HitObject.js";
export { default as HitCircle } from "./HitObjects/HitCircle.js";
export { default as Slider } from "./HitObjects/Slider.js";
export { default as Spinner } from "./HitObjects/Spinner.js";
export { default as Hold } from "./HitObjects/Hold.js";
export { ParseTimingPoint, SerializeTimingPoint, ShiftTimingPoint, SliderVelocity } from "./TimingPoint.js";
export { SerializeBeatmap } from "./Serializer.js";
export { ComputeOffsets, MergeBeatmaps } from "./OffsetEngine.js";
export { ApplyDifficulty, ReadDifficulty } from "./DifficultyOverride.js";
export { ApplyMetadata } from "./MetadataOverride.js";
export { DiscoverInputs, PairInputs } from "./Discovery.js";
export { AudioBackend, FfmpegAudioBackend, FfmpegAudioBackendLive } from "./Audio.js";
export type { AudioBackendService } from "./Audio.js";
export { LoadMergeSpec } from "./Config.js";
export { RunMerge } from "./Merger.js";
export { Main } from "./Main.js";
export { InputMismatchError, ParseError, OffsetError, AudioBackendError, IOError, UsageError } from "./Errors.js";
export type { MergeError } from "./Errors.js";
export type { TimingPoint, HitObjectFields, DifficultySettings, MergeSpec, InputPair, MergeResult } from "./Types.js";
