export type DistanceUnit = "kilometers" | "meters" | "miles" | "nauticalMiles";

export const DISTANCE_UNITS: readonly DistanceUnit[] = ["kilometers", "meters", "miles", "nauticalMiles"];

export const METERS_PER_KM = 1000;
export const KM_PER_MILE = 1.609344;
export const KM_PER_NAUTICAL_MILE = 1.852;

export function isDistanceUnit(value: string): value is DistanceUnit {
  return DISTANCE_UNITS.some((unit) => unit === value);
}

export function convertDistanceFromKm(km: number, unit: DistanceUnit): number {
  switch (unit) {
    case "meters":
      return km * METERS_PER_KM;
    case "miles":
      return km / KM_PER_MILE;
    case "nauticalMiles":
      return km / KM_PER_NAUTICAL_MILE;
    case "kilometers":
      return km;
  }
}

export function convertDistanceToKm(value: number, unit: DistanceUnit): number {
  switch (unit) {
    case "meters":
      return value / METERS_PER_KM;
    case "miles":
      return value * KM_PER_MILE;
    case "nauticalMiles":
      return value * KM_PER_NAUTICAL_MILE;
    case "kilometers":
      return value;
  }
}
