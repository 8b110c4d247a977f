import fs from "node:fs/promises";
import { Readable } from "node:stream";
import csvParser from "csv-parser";
import { emptyTopology, formatDeviceId, type Reading, type Topology } from "tp-shared/types";
import { formatZodError, ReadingRowSchema, TopologyFileSchema } from "./schema";
import type { LoadedReadings, RawRow, RejectedRow } from "./types";

export const loadJson = async (p: string): Promise<unknown> => {
  try {
    const txt = await fs.readFile(p, "utf8");
    return JSON.parse(txt);
  } catch (err) {
    console.error(`Failed to load JSON from ${p}:`, err);
    return null;
  }
};

/**
 * Read a delimited file into header-keyed rows. Headers are lowercased and
 * cells trimmed; quoted fields may hold separators, quotes and newlines.
 */
export async function parseCsv(text: string): Promise<RawRow[]> {
  const stream = Readable.from([text]).pipe(
    csvParser({
      separator: ",",
      mapHeaders: ({ header }) => header.trim().toLowerCase(),
      mapValues: ({ value }) => (typeof value === "string" ? value.trim() : value),
    }),
  );

  const rows: RawRow[] = [];
  for await (const row of stream) {
    rows.push(row);
  }
  return rows;
}

export function topologyFromJson(data: unknown): Topology {
  const parsed = TopologyFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid topology: ${formatZodError(parsed.error)}`);
  }
  const { devices, complexes, deviceCounts } = parsed.data;
  return {
    devices: new Map(Object.entries(devices)),
    complexes: new Map(Object.entries(complexes)),
    deviceCounts: new Map(Object.entries(deviceCounts)),
  };
}

export async function loadTopology(p: string | undefined): Promise<Topology> {
  if (!p) return emptyTopology();
  const data = await loadJson(p);
  if (data === null) {
    throw new Error(`Topology file ${p} could not be read`);
  }
  return topologyFromJson(data);
}

/**
 * Turn readings CSV text into readings. A row names its device either by
 * `device_id` or by the provider key (`c_a`, `unit`, `scp`), and its station by
 * `station_id` or through the topology's device map. Rows that fail are
 * returned with their record number instead of aborting the load.
 */
export async function parseReadings(
  text: string,
  topology: Topology = emptyTopology(),
): Promise<LoadedReadings> {
  const rows = await parseCsv(text);
  const readings: Reading[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((raw, i) => {
    const row = i + 1;
    const parsed = ReadingRowSchema.safeParse(raw);
    if (!parsed.success) {
      rejected.push({ row, reason: formatZodError(parsed.error) });
      return;
    }
    const cells = parsed.data;

    const deviceId =
      cells.device_id ??
      (cells.c_a && cells.unit && cells.scp ? formatDeviceId(cells.c_a, cells.unit, cells.scp) : undefined);
    if (!deviceId) {
      rejected.push({ row, reason: "no device_id and no complete c_a/unit/scp key" });
      return;
    }
    const stationId = cells.station_id ?? topology.devices.get(deviceId);
    if (!stationId) {
      rejected.push({ row, reason: `no station for device ${deviceId}` });
      return;
    }

    readings.push({ deviceId, stationId, timestamp: cells.timestamp, netIncrement: cells.net_increment });
  });

  return { readings, rejected };
}

export async function loadReadings(p: string, topology?: Topology): Promise<LoadedReadings> {
  const text = await fs.readFile(p, "utf8");
  return parseReadings(text, topology);
}
