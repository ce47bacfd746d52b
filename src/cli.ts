import { readFileSync, writeFileSync } from "node:fs";
import { createConfig } from "./config";
import { AnalysisError, InputFileError, OutputFileError } from "./errors";
import { resolveOptions } from "./options";
import { analyze } from "./pipeline";

function readInput(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (err) {
    throw new InputFileError(path, err);
  }
}

/**
 * CLI entrypoint.
 *
 * Pipeline:
 * 1) Resolve options (two input paths, output path, flags).
 * 2) Read the roster and meetings files.
 * 3) Run the analysis; any error stops here and nothing is written.
 * 4) Write the report to the output file.
 * 5) Log the per-band counts.
 */
export async function runCli(): Promise<void> {
  const options = resolveOptions(process.argv.slice(2), process.env);
  const config = createConfig({ clampTransmission: options.clamp });

  const rosterText = readInput(options.rosterPath);
  const meetingsText = readInput(options.meetingsPath);

  const result = analyze(rosterText, meetingsText, config);

  if (result.degenerate > 0) {
    console.warn(
      `Warning: ${result.degenerate} probabilities are not finite (zero-distance meetings).`
    );
  }

  if (options.verbose) {
    for (const l of result.lines) {
      console.log(`${l.id}\t${l.name}\t${l.probability}\t${l.band}`);
    }
  }

  try {
    writeFileSync(options.outPath, result.report, "utf8");
  } catch (err) {
    throw new OutputFileError(options.outPath, err);
  }

  const { lists } = result;
  console.log(`Wrote ${options.outPath} (${result.lines.length} people)`);
  console.log(`Hospitalization (>=${config.hospitalizationThreshold}): ${lists.hospitalization_required.length}`);
  console.log(`Quarantine (>=${config.quarantineThreshold}): ${lists.quarantine_required.length}`);
  console.log(`No serious risk: ${lists.no_serious_risk.length}`);
  console.log(`Risk age: ${lists.risk_age.length}`);
}

runCli().catch((err) => {
  if (err instanceof AnalysisError) console.error(err.message);
  else console.error("Fatal error:", err);
  process.exit(1);
});
