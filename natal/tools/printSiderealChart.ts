// DEV TOOL: prints the sidereal conversion walkthrough for a profile and a
// saved ephemeris response. Does not call the remote service.
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { RawBirthProfileSchema } from "../birth/birthMoment.schema.js";
import { normalizeBirthMoment } from "../birth/normalizeBirthMoment.js";
import { computeChartBundle } from "../chart/assembleChartBundle.js";
import { DEFAULT_PLANETS } from "../chart/chartBundle.schema.js";
import {
  describeCalculationSteps,
  formatCalculationSteps,
} from "../chart/describeCalculationSteps.js";
import { parseEphemerisResponse } from "../ephemeris/ephemerisSource.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.resolve(__dirname, "fixtures");

function usage() {
  console.error(
    "Usage: tsx natal/tools/printSiderealChart.ts [profile.json] [tropical.json]"
  );
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf8"));
}

async function main() {
  const profilePath = process.argv[2] ?? path.join(FIXTURES, "illustrative-profile.json");
  const tropicalPath = process.argv[3] ?? path.join(FIXTURES, "illustrative-tropical.json");
  if (!fs.existsSync(profilePath) || !fs.existsSync(tropicalPath)) {
    usage();
    process.exit(1);
  }

  const profile = RawBirthProfileSchema.parse(readJson(profilePath));
  const moment = normalizeBirthMoment(profile);
  if (!moment.ok) {
    console.error(JSON.stringify(moment.error, null, 2));
    process.exit(1);
  }

  const positions = parseEphemerisResponse(readJson(tropicalPath));
  if (!positions.ok) {
    console.error(JSON.stringify(positions.error, null, 2));
    process.exit(1);
  }

  const bundle = computeChartBundle(moment.value, positions.value, DEFAULT_PLANETS);
  if (!bundle.ok) {
    console.error(JSON.stringify(bundle.error, null, 2));
    process.exit(1);
  }

  console.log(formatCalculationSteps(describeCalculationSteps(bundle.value)));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
