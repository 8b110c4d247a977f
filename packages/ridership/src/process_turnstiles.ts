import fs from "node:fs/promises";
import path from "node:path";
import {
  dailyShares,
  runPipeline,
  timeOfDayProfile,
  topCoverage,
  type PipelineOptions,
} from "tp-metrics";
import { GroupingKey } from "tp-shared/types";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { dumpCsv } from "./dump";
import { loadReadings, loadTopology } from "./parse";
import { checkBucketContinuity, reportIssues } from "./validate";

function parseArgs() {
  const argv = yargs(hideBin(process.argv))
    .scriptName("turnstile-metrics")
    .option("readings", {
      alias: "r",
      type: "string",
      demandOption: true,
      describe: "Readings CSV (device_id or c_a/unit/scp, station_id, timestamp, net_increment)",
    })
    .option("topology", {
      alias: "t",
      type: "string",
      describe: "Topology JSON with devices, complexes and deviceCounts maps",
    })
    .option("out-dir", {
      alias: "o",
      type: "string",
      default: path.join(process.cwd(), "output"),
      describe: "Directory for the CSV tables",
    })
    .option("resolution", {
      type: "string",
      default: "1h",
      describe: "Bucket width, e.g. 1h, 4h, 15m",
    })
    .option("group-by", {
      alias: "g",
      choices: ["station", "complex"] as const,
      default: "station" as const,
      describe: "Entity to aggregate devices into",
    })
    .option("min-coverage", {
      type: "number",
      default: 0,
      describe: "Flag buckets reported by fewer entities than this",
    })
    .option("traffic-weight", { type: "number", default: 0, describe: "Offset added to traffic scores" })
    .option("density-weight", { type: "number", default: 0, describe: "Offset added to density scores" })
    .option("anchor", {
      choices: ["end", "start"] as const,
      default: "end" as const,
      describe: "Attribute an interval to its end or start reading",
    })
    .option("drop-zero-rates", { type: "boolean", default: false, describe: "Drop intervals with no traffic" })
    .option("keep-low-coverage", {
      type: "boolean",
      default: false,
      describe: "Score low-coverage buckets instead of excluding them",
    })
    .option("batching", {
      choices: ["pooled", "per-bucket"] as const,
      default: "pooled" as const,
      describe: "Normalize priority over the whole series or bucket by bucket",
    })
    .option("shares", { type: "boolean", default: false, describe: "Also write daily shares and top-N coverage" })
    .option("profile", { type: "boolean", default: false, describe: "Also write the time-of-day profile" })
    .strict()
    .help()
    .parseSync();

  const options: PipelineOptions = {
    bucketResolution: argv.resolution,
    minCoverage: argv["min-coverage"],
    trafficWeight: argv["traffic-weight"],
    densityWeight: argv["density-weight"],
    groupingKey: argv["group-by"] === "complex" ? GroupingKey.Complex : GroupingKey.Station,
    anchor: argv.anchor,
    dropZeroRates: argv["drop-zero-rates"],
    keepLowCoverage: argv["keep-low-coverage"],
    batching: argv.batching,
  };

  return {
    readingsPath: argv.readings,
    topologyPath: argv.topology,
    outDir: argv["out-dir"],
    options,
    writeShares: argv.shares,
    writeProfile: argv.profile,
  };
}

async function writeTable(outDir: string, name: string, csv: string) {
  const p = path.join(outDir, name);
  await fs.writeFile(p, csv, "utf8");
  console.log(`Wrote ${p}`);
}

async function main() {
  const { readingsPath, topologyPath, outDir, options, writeShares, writeProfile } = parseArgs();

  console.log("Loading data...");
  const topology = await loadTopology(topologyPath);
  const { readings, rejected } = await loadReadings(readingsPath, topology);
  console.log(`Readings: ${readings.length} (${rejected.length} rejected)`);
  for (const r of rejected.slice(0, 5)) {
    console.warn(`  row ${r.row}: ${r.reason}`);
  }

  const result = runPipeline(readings, topology, options);
  const { stats } = result;
  console.log(
    `Devices: ${stats.devices}, intervals: ${stats.intervals}, entities: ${stats.entities}, buckets: ${stats.buckets}`,
  );
  if (stats.lowCoverageRows > 0) {
    const verb = result.config.keepLowCoverage ? "kept" : "excluded";
    console.log(`Low-coverage rows ${verb}: ${stats.lowCoverageRows}`);
  }
  reportIssues(result.issues);
  checkBucketContinuity(result.aggregates, result.config.bucketResolution);

  await fs.mkdir(outDir, { recursive: true });
  await writeTable(
    outDir,
    "timeseries.csv",
    dumpCsv(result.timeSeries, [
      "entity",
      "kind",
      "bucket",
      "totalTraffic",
      "density",
      "deviceCount",
      "coverage",
      "lowConfidence",
      "priority",
    ]),
  );
  await writeTable(
    outDir,
    "summary.csv",
    dumpCsv(result.summary, [
      "rank",
      "entity",
      "kind",
      "sumTraffic",
      "meanTraffic",
      "sumDensity",
      "meanDensity",
      "buckets",
      "priority",
    ]),
  );

  if (writeShares) {
    const shares = dailyShares(result.aggregates);
    await writeTable(
      outDir,
      "daily-share.csv",
      dumpCsv(shares, ["day", "weekday", "entity", "kind", "traffic", "dayTotal", "share"]),
    );
    await writeTable(
      outDir,
      "top-coverage.csv",
      dumpCsv(topCoverage(shares), ["rank", "entity", "kind", "meanShare", "cumulativeShare"]),
    );
  }
  if (writeProfile) {
    await writeTable(
      outDir,
      "profile.csv",
      dumpCsv(timeOfDayProfile(result.aggregates), [
        "entity",
        "kind",
        "slot",
        "meanTraffic",
        "meanDensity",
        "days",
      ]),
    );
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
