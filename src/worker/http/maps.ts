import type { Coordinates, GeocodeOutcome, TravelMode } from "@/lib/domain/types";

/**
 * Address lookup. Zero candidates is `not_found`, more than one is
 * `ambiguous`; transport and API errors throw GeocodeFailureError.
 */
export interface Geocoder {
  geocode(address: string): Promise<GeocodeOutcome>;
}

/** Travel time in minutes for the given mode; throws DistanceFailureError. */
export interface DistanceProvider {
  travelMinutes(origin: Coordinates, destination: Coordinates, mode: TravelMode): Promise<number>;
}

export interface PlaceHit {
  name: string;
  location: Coordinates;
}

export interface PlacesProvider {
  search(keyword: string, near: Coordinates, radiusMeters: number): Promise<PlaceHit[]>;
}

export interface MapServices {
  geocoder: Geocoder;
  distance: DistanceProvider;
  places: PlacesProvider;
}
