import { z } from 'zod/v4';
import { ValidationError } from '@shared/lib/errors.js';

export const AddressLocationSchema = z.object({
  kind: z.literal('address'),
  /** Free-form street address as typed into the estimator's search box. */
  address: z.string().trim().min(1),
});

export const CoordinatesLocationSchema = z.object({
  kind: z.literal('coordinates'),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export const LocationSchema = z.discriminatedUnion('kind', [
  AddressLocationSchema,
  CoordinatesLocationSchema,
]);

export type AddressLocation = z.infer<typeof AddressLocationSchema>;
export type CoordinatesLocation = z.infer<typeof CoordinatesLocationSchema>;
export type Location = z.infer<typeof LocationSchema>;

const COORDINATE_PAIR = /^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/;

/**
 * Parse a CLI location argument. `"14.69,-17.45"` becomes a coordinate pair;
 * anything else is treated as an address.
 *
 * @throws ValidationError for blank input or out-of-range coordinates
 */
export function parseLocation(input: string): Location {
  const pair = COORDINATE_PAIR.exec(input);
  const candidate = pair
    ? { kind: 'coordinates', lat: Number(pair[1]), lon: Number(pair[2]) }
    : { kind: 'address', address: input };

  return validateLocation(candidate);
}

/**
 * Validate and freeze a location. A run never sees a location it could mutate.
 */
export function validateLocation(candidate: unknown): Location {
  const result = LocationSchema.safeParse(candidate);
  if (!result.success) {
    throw new ValidationError('Invalid location: an address or a "lat,lon" pair is required', result.error.issues);
  }
  return Object.freeze(result.data);
}

export function describeLocation(location: Location): string {
  return location.kind === 'address'
    ? location.address
    : `${location.lat.toFixed(4)}, ${location.lon.toFixed(4)}`;
}
