import HitObject from "./HitObject.js";

class HitCircle extends HitObject {
    shift(offset: number): HitCircle {
        return new HitCircle({ ...this.fields, time: this.time + offset });
    }
}

export default HitCircle;
