#!/usr/bin/env node
// cli/generate-bills.ts
import { parseArgs } from "util";
import { loadConfig, parseRunParams } from "../lib/config";
import { consoleLogger, generateBills, RunLogger } from "../lib/run";

export const USAGE = `Usage: generate-bills <manifest.xlsx> [options]

  --out <dir>                 output folder (default: the manifest's folder)
  --rate <usd>                rate in USD per CBM (default 240)
  --other-cost <usd>          flat other cost added to every bill (default 0)
  --location <text>           location used when the sheet has none (default ACCRA GHANA)
  --min-charge <floor|none>   floor: below 0.05 CBM bills a fixed $10 (default floor)
  --blank-quantity <zero|one> what an empty quantity cell counts as (default zero)
  -h, --help                  show this help`;

export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  log: RunLogger = consoleLogger
): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        out: { type: "string" },
        rate: { type: "string" },
        "other-cost": { type: "string" },
        location: { type: "string" },
        "min-charge": { type: "string" },
        "blank-quantity": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });

    if (values.help) {
      console.log(USAGE);
      return 0;
    }
    const inputPath = positionals[0];
    if (!inputPath) throw new Error("No manifest given.\n\n" + USAGE);

    const config = loadConfig(env);
    const params = parseRunParams(
      {
        rate: values.rate,
        otherCost: values["other-cost"],
        location: values.location,
        minCharge: values["min-charge"],
        blankQuantity: values["blank-quantity"],
      },
      config.params
    );

    const result = await generateBills({ inputPath, outDir: values.out ?? config.outDir, params, log });
    log(`Generated ${result.bills.length} PDFs + Messages.csv + Summary.xlsx`);
    return 0;
  } catch (e: unknown) {
    console.error("[bills]", e instanceof Error ? e.message : String(e));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (e: unknown) => {
      console.error("[bills]", e);
      process.exitCode = 1;
    }
  );
}
