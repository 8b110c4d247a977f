export type DeviceId = string;
export type StationId = string;
export type ComplexId = string;
export type EntityId = StationId | ComplexId;

/** Epoch seconds, UTC */
export type Timestamp = number;

/** Level at which device traffic is rolled up. */
export enum GroupingKey {
  Station = "station",
  Complex = "complex",
}

/** One cleaned counter reading. `netIncrement` counts events since the previous reading of the device. */
export type Reading = Readonly<{
  deviceId: DeviceId;
  stationId: StationId;
  timestamp: Timestamp;
  netIncrement: number;
}>;

/**
 * Static network layout handed over with the readings.
 * Every map is optional per key: a station may have no complex, and a
 * missing device count falls back to the devices observed in the run.
 */
export type Topology = Readonly<{
  devices: ReadonlyMap<DeviceId, StationId>;
  complexes: ReadonlyMap<StationId, ComplexId>;
  deviceCounts: ReadonlyMap<StationId, number>;
}>;

export const emptyTopology = (): Topology => ({
  devices: new Map(),
  complexes: new Map(),
  deviceCounts: new Map(),
});

/** Collapse the provider's (control area, unit, subunit) key into one device id */
export function formatDeviceId(controlArea: string, unit: string, subunit: string): DeviceId {
  return `${controlArea.trim()}/${unit.trim()}/${subunit.trim()}`;
}
