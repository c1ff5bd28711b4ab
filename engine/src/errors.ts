export type GeometryErrorKind =
  | "DegenerateGeometry"
  | "EmptyGeometry"
  | "UnsupportedVariant"
  | "NoResult"
  | "InvalidArgument";

export class GeometryError extends Error {
  readonly kind: GeometryErrorKind;

  constructor(kind: GeometryErrorKind, message: string) {
    super(message);
    this.name = "GeometryError";
    this.kind = kind;
  }
}

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure {
  readonly ok: false;
  readonly error: GeometryError;
}

/** Outcome of a fallible geometry operation; lets callers tell "computed zero" from "could not compute". */
export type GeoResult<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(kind: GeometryErrorKind, message: string): Failure {
  return { ok: false, error: new GeometryError(kind, message) };
}

/** Return the value or throw the carried GeometryError. */
export function unwrap<T>(result: GeoResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function describeVariant(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object" && "type" in value) {
    return `type ${String(value.type)}`;
  }
  return typeof value;
}

export function unsupported(value: unknown): Failure {
  return failure("UnsupportedVariant", `unsupported geojson ${describeVariant(value)}`);
}
