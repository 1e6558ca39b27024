import { parseArgs } from "node:util";
import { Config, ConfigError, ConfigProvider, Effect, Option } from "effect";
import { UsageError } from "./Errors.js";
import type { MergeSpec } from "./Types.js";
import { DescribeCause } from "./Utils.js";

const ENV_PREFIX = "BEATMAP_MERGE_";

const USAGE = [
    "usage: beatmap-merge <input_dir> [options]",
    "",
    "  --output-osu NAME     merged beatmap file (default merged.osu)",
    "  --output-audio NAME   merged audio file (default merged_audio.mp3)",
    "  --hp F                HP drain rate (default 5)",
    "  --od F                overall difficulty (default 8)",
    "  --cs F                circle size (default 4)",
    "  --ar F                approach rate (default 9)",
    "  --version NAME        difficulty name of the merged map",
    "  --verbose             debug logging",
    "  -h, --help            show this help",
].join("\n");

const OPTIONS = {
    "output-osu": { type: "string" },
    "output-audio": { type: "string" },
    hp: { type: "string" },
    od: { type: "string" },
    cs: { type: "string" },
    ar: { type: "string" },
    version: { type: "string" },
    verbose: { type: "boolean" },
    help: { type: "boolean", short: "h" },
} as const;

const DifficultyConfig = (key: string, fallback: number) =>
    Config.number(key).pipe(
        Config.withDefault(fallback),
        Config.validate({ message: "Expected a value between 0 and 10", validation: (val: number) => val >= 0 && val <= 10 }),
    );

const MergeSpecConfig: Config.Config<MergeSpec> = Config.all({
    inputDir: Config.nonEmptyString("inputDir"),
    outputOsu: Config.nonEmptyString("outputOsu").pipe(Config.withDefault("merged.osu")),
    outputAudio: Config.nonEmptyString("outputAudio").pipe(Config.withDefault("merged_audio.mp3")),
    hp: DifficultyConfig("hp", 5),
    od: DifficultyConfig("od", 8),
    cs: DifficultyConfig("cs", 4),
    ar: DifficultyConfig("ar", 9),
    version: Config.option(Config.nonEmptyString("version")),
    verbose: Config.boolean("verbose").pipe(Config.withDefault(false)),
}).pipe(
    Config.map((values) => ({
        inputDir: values.inputDir,
        outputOsu: values.outputOsu,
        outputAudio: values.outputAudio,
        difficulty: {
            HPDrainRate: values.hp,
            CircleSize: values.cs,
            OverallDifficulty: values.od,
            ApproachRate: values.ar,
        },
        version: Option.getOrUndefined(values.version),
        verbose: values.verbose,
    })),
);

// outputOsu -> OUTPUT_OSU
const ConstantCase = (key: string): string => key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase();

const EnvConfigProvider = (env: Record<string, string | undefined>): ConfigProvider.ConfigProvider => {
    const entries: [string, string][] = Object.entries(env).flatMap(([key, value]) =>
        typeof value === "string" && key.startsWith(ENV_PREFIX) ? [[key, value]] : [],
    );

    return ConfigProvider.fromMap(new Map(entries)).pipe(
        ConfigProvider.mapInputPath((key) => `${ENV_PREFIX}${ConstantCase(key)}`),
    );
};

/**
 * Flags win over `BEATMAP_MERGE_*` environment variables, which win over defaults.
 */
const LoadMergeSpec = (
    argv: readonly string[],
    env: Record<string, string | undefined> = process.env,
): Effect.Effect<MergeSpec, UsageError> =>
    Effect.gen(function* () {
        const { values, positionals } = yield* Effect.try({
            try: () => parseArgs({ args: [...argv], allowPositionals: true, strict: true, options: OPTIONS }),
            catch: (cause) => new UsageError({ message: DescribeCause(cause) }),
        });

        if (positionals.length > 1)
            return yield* Effect.fail(new UsageError({ message: `expected one input directory, got ${positionals.length}` }));

        const flags: [string, string | undefined][] = [
            ["inputDir", positionals[0]],
            ["outputOsu", values["output-osu"]],
            ["outputAudio", values["output-audio"]],
            ["hp", values.hp],
            ["od", values.od],
            ["cs", values.cs],
            ["ar", values.ar],
            ["version", values.version],
            ["verbose", values.verbose === undefined ? undefined : String(values.verbose)],
        ];
        const provided = new Map(flags.flatMap(([key, value]) => (value === undefined ? [] : [[key, value] as [string, string]])));

        const provider = ConfigProvider.fromMap(provided).pipe(ConfigProvider.orElse(() => EnvConfigProvider(env)));

        return yield* provider.load(MergeSpecConfig).pipe(
            Effect.mapError((error: ConfigError.ConfigError) => new UsageError({ message: String(error) })),
        );
    });

// `--version --help` names a version, it does not ask for help
const IsHelpRequested = (argv: readonly string[]): boolean => {
    const { tokens } = parseArgs({ args: [...argv], allowPositionals: true, strict: false, tokens: true, options: OPTIONS });
    return tokens.some((token) => token.kind === "option" && token.name === "help");
};

export { ENV_PREFIX, USAGE, EnvConfigProvider, LoadMergeSpec, IsHelpRequested };
