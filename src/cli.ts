#!/usr/bin/env node
import { Effect } from "effect";
import { FfmpegAudioBackendLive } from "./Audio.js";
import { EXIT_FAILURE, Main } from "./Main.js";

Effect.runPromise(Main(process.argv.slice(2)).pipe(Effect.provide(FfmpegAudioBackendLive)))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error("[beatmap-merge] unexpected failure:", error);
        process.exitCode = EXIT_FAILURE;
    });
