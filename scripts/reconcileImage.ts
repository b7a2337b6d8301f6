// scripts/reconcileImage.ts
//
// Run the reconciliation engine on one local screenshot and print the report.
//
//   npm run reconcile -- ./screens/uluwatu.png "uluwatu tomorrow"
//
import { config } from "dotenv";
import { readFile } from "fs/promises";
import { resolve } from "path";
import { createForecastService } from "@/lib/forecast";
import { PlainTextReportConsumer } from "@/lib/report/plainTextReport";
import { parseCaption, resolveForecastDate } from "@/lib/session/captionParser";
import { getErrorMessage } from "@/lib/utils/error";

// Load .env.local first, then .env
config({ path: resolve(process.cwd(), ".env.local") });
config({ path: resolve(process.cwd(), ".env") });

async function main(): Promise<void> {
  const [imagePath, caption] = process.argv.slice(2);
  if (!imagePath) {
    throw new Error('Usage: reconcileImage <image path> "<spot> [date]"');
  }

  const { engine, spots, sessions } = createForecastService(process.env);
  const { spotToken, dateToken } = parseCaption(caption ?? null);
  const spot = spotToken ? spots.lookup(spotToken) : null;
  if (!spot) {
    throw new Error(`Unknown spot "${spotToken ?? ""}". Known: ${spots.list().map((s) => s.name).join(", ")}`);
  }

  const image = await readFile(resolve(process.cwd(), imagePath));
  const date = resolveForecastDate(dateToken, new Date(), spot.utcOffsetMinutes);

  const result = await engine.reconcileDetailed({
    image,
    spot: spot.coordinates,
    date,
    utcOffsetMinutes: spot.utcOffsetMinutes,
  });

  console.log(new PlainTextReportConsumer().present(result.sample, spot.name, date));
  console.log("");
  console.log("provenance:", result.sample.provenance);
  console.log("base:", result.base ?? "none");
  console.log("fields:", result.fieldSources);
  console.log("candidates:", result.candidates);
  console.log("reasons:", result.reasons.join(", ") || "none");

  sessions.dispose();
}

main().catch((error: unknown) => {
  console.error("[reconcileImage]", getErrorMessage(error));
  process.exitCode = 1;
});
