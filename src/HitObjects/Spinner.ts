import HitObject from "./HitObject.js";
import type { HitObjectFields } from "../Types.js";
import { FormatNumber, ParseInteger } from "../Utils.js";

// x,y,time,type,hitSound,endTime,hitSample
class Spinner extends HitObject {
    public end: number;

    constructor(fields: HitObjectFields) {
        super(fields);
        this.end = ParseInteger(this.objectParams[0]) ?? this.time;
    }

    endTime(): number {
        return this.end;
    }

    shift(offset: number): Spinner {
        const fields: HitObjectFields = this.fields;
        fields.time += offset;
        fields.objectParams[0] = FormatNumber(this.end + offset);

        return new Spinner(fields);
    }
}

export default Spinner;
