import HitObject from "./HitObject.js";
import type { TimingContext } from "./HitObject.js";
import type { HitObjectFields, TimingPoint } from "../Types.js";
import { ParseInteger, ParseNumber } from "../Utils.js";
import { SliderVelocity } from "../TimingPoint.js";

// x,y,time,type,hitSound,curveType|curvePoints,slides,length,edgeSounds,edgeSets,hitSample
class Slider extends HitObject {
    public repeat: number;
    public length: number;

    constructor(fields: HitObjectFields) {
        super(fields);
        this.repeat = ParseInteger(this.objectParams[1]) ?? 1;
        this.length = ParseNumber(this.objectParams[2]) ?? 0;
    }

    /**
     * Slider end from the pixel length, the beat length of the governing uninherited point and the
     * slider velocity of the latest point at or before the slider head.
     */
    endTime(timing: TimingContext): number {
        const points: readonly TimingPoint[] = timing.timingPoints;
        const beatStep: number =
            points.filter((point) => point.uninherited && point.time <= this.time).at(-1)?.beatLength ??
            points.find((point) => point.uninherited)?.beatLength ??
            0;
        const current: TimingPoint | undefined = points.filter((point) => point.time <= this.time).at(-1);
        const SV: number = current === undefined ? 1 : SliderVelocity(current);

        if (timing.sliderMultiplier <= 0) return this.time;

        const sliderTime: number = (beatStep * this.length) / SV / (timing.sliderMultiplier * 100);
        return Math.round(this.time + sliderTime * this.repeat);
    }

    shift(offset: number): Slider {
        return new Slider({ ...this.fields, time: this.time + offset });
    }
}

export default Slider;
