const SplitLines = (text: string): string[] => text.split(/\r?\n/);
const IsComment = (line: string): boolean => line.trimStart().startsWith("//");
const IsBlank = (line: string): boolean => line.trim() === "";

// Number("") is 0, so blank fields have to be rejected before conversion
const ParseNumber = (raw: string | undefined): number | undefined => {
    if (raw === undefined || raw.trim() === "") return undefined;
    const val: number = Number(raw);
    return Number.isFinite(val) ? val : undefined;
};
const ParseInteger = (raw: string | undefined): number | undefined => {
    const val: number | undefined = ParseNumber(raw);
    return val === undefined ? undefined : Math.trunc(val);
};

const FormatNumber = (val: number): string => Object.is(val, -0) ? "0" : val.toString();
const Pad = (value: number | string, padSize: number, padStart: boolean = false): string =>
    padStart ? value.toString().padStart(padSize, " ") : value.toString().padEnd(padSize, " ");
const Sum = (values: readonly number[]): number => values.reduce((accumulated, curr) => accumulated + curr, 0);

const DescribeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

const FormatDuration = (ms: number): string => {
    const totalSeconds: number = Math.floor(ms / 1000);
    const minutes: number = Math.floor(totalSeconds / 60);
    const seconds: number = totalSeconds % 60;

    return `${minutes}:${seconds.toString().padStart(2, "0")}.${(ms % 1000).toString().padStart(3, "0")}`;
};

export { SplitLines, IsComment, IsBlank, ParseNumber, ParseInteger, FormatNumber, Pad, Sum, DescribeCause, FormatDuration };
