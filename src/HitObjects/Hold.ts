import HitObject from "./HitObject.js";
import type { HitObjectFields } from "../Types.js";
import { FormatNumber, ParseInteger } from "../Utils.js";

// osu!mania hold note: x,y,time,type,hitSound,endTime:hitSample
// The end time shares its field with the hit sample, separated by a colon.
class Hold extends HitObject {
    public end: number;

    constructor(fields: HitObjectFields) {
        super(fields);
        this.end = ParseInteger(this.objectParams[0]) ?? this.time;
    }

    endTime(): number {
        return this.end;
    }

    shift(offset: number): Hold {
        const fields: HitObjectFields = this.fields;
        fields.time += offset;
        fields.objectParams[0] = FormatNumber(this.end + offset);

        return new Hold(fields);
    }

    toString(): string {
        const head: string = [this.x, this.y, this.time, this.type, this.hitSound].map(FormatNumber).join(",");
        const tail: string = this.hitSample === undefined ? this.objectParams[0] ?? "" : `${this.objectParams[0] ?? ""}:${this.hitSample}`;

        return `${head},${tail}`;
    }
}

export default Hold;
