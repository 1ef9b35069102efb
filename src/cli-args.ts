export type CliCharger = {
  readonly name: string;
  readonly powerKw: number;
  readonly quantity: number;
};

export type CliArgs = {
  readonly files: readonly string[];
  readonly layout: string | undefined;
  readonly outputDir: string | undefined;
  readonly chargers: readonly CliCharger[];
};

const flagValue = (args: readonly string[], name: string): string | undefined =>
  args.find((arg) => arg.startsWith(`--${name}=`))?.slice(name.length + 3);

// "DCFC:150:2" -> { name: "DCFC", powerKw: 150, quantity: 2 }; bad numbers stay NaN for the config schema to reject
export const parseChargerFlag = (value: string): CliCharger => {
  const [name = "", powerKw = "", quantity = ""] = value.split(":");

  return {
    name,
    powerKw: powerKw.trim() === "" ? Number.NaN : Number(powerKw),
    quantity: quantity.trim() === "" ? Number.NaN : Number(quantity),
  };
};

export const parseCliArgs = (args: readonly string[]): CliArgs => ({
  files: args.filter((arg) => !arg.startsWith("--")),
  layout: flagValue(args, "layout"),
  outputDir: flagValue(args, "out"),
  chargers: args
    .filter((arg) => arg.startsWith("--charger="))
    .map((arg) => parseChargerFlag(arg.slice("--charger=".length))),
});
