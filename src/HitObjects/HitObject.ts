import type { HitObjectFields, TimingPoint } from "../Types.js";
import { FormatNumber } from "../Utils.js";

interface TimingContext {
    timingPoints: readonly TimingPoint[],
    sliderMultiplier: number
}

export default class HitObject {
    public x: number;
    public y: number;
    public time: number;
    public type: number;
    public hitSound: number;
    public objectParams: string[];
    public hitSample: string | undefined;

    constructor(fields: HitObjectFields) {
        this.x = fields.x;
        this.y = fields.y;
        this.time = fields.time;
        this.type = fields.type;
        this.hitSound = fields.hitSound;
        this.objectParams = [...fields.objectParams];
        this.hitSample = fields.hitSample;
    }

    public get fields(): HitObjectFields {
        return {
            x: this.x,
            y: this.y,
            time: this.time,
            type: this.type,
            hitSound: this.hitSound,
            objectParams: [...this.objectParams],
            hitSample: this.hitSample,
        };
    }

    public endTime(_timing: TimingContext): number {
        return this.time;
    }

    public shift(offset: number): HitObject {
        return new HitObject({ ...this.fields, time: this.time + offset });
    }

    public toString(): string {
        const nodes: string[] = [
            FormatNumber(this.x),
            FormatNumber(this.y),
            FormatNumber(this.time),
            FormatNumber(this.type),
            FormatNumber(this.hitSound),
            ...this.objectParams,
        ];
        if (this.hitSample !== undefined) nodes.push(this.hitSample);

        return nodes.join(",");
    }
}

export type { TimingContext };
