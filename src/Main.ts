import { Effect, Logger, LogLevel } from "effect";
import type { AudioBackend } from "./Audio.js";
import { IsHelpRequested, LoadMergeSpec, USAGE } from "./Config.js";
import { RunMerge } from "./Merger.js";

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

/**
 * Full command-line run. Resolves to the process exit code; errors are reported on stderr.
 */
const Main = (argv: readonly string[], env: Record<string, string | undefined> = process.env): Effect.Effect<number, never, AudioBackend> => {
    if (IsHelpRequested(argv)) return Effect.sync(() => console.log(USAGE)).pipe(Effect.as(EXIT_OK));

    return LoadMergeSpec(argv, env).pipe(
        Effect.flatMap((spec) => RunMerge(spec).pipe(Logger.withMinimumLogLevel(spec.verbose ? LogLevel.Debug : LogLevel.Info))),
        Effect.as(EXIT_OK),
        Effect.catchAll((error) =>
            Effect.sync(() => {
                console.error(`[beatmap-merge] ${error._tag}: ${error.message}`);
                if (error._tag === "UsageError") console.error(USAGE);

                return error._tag === "UsageError" ? EXIT_USAGE : EXIT_FAILURE;
            }),
        ),
    );
};

export { EXIT_OK, EXIT_FAILURE, EXIT_USAGE, Main };
