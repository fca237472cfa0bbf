/**
 * Google Maps web services: Geocoding, Distance Matrix (transit, walking) and
 * Places Text Search. Calls go through the fetch policy; callers are
 * responsible for charging the run's ApiBudget.
 */

import { z } from "zod";
import { fetchWithPolicy } from "./fetchWithPolicy";
import type { FetchPolicyOptions } from "./fetchWithPolicy";
import type { DistanceProvider, Geocoder, PlaceHit, PlacesProvider } from "./maps";
import { ConfigError, DistanceFailureError, GeocodeFailureError } from "@/lib/errors";
import type { Coordinates, GeocodeOutcome, TravelMode } from "@/lib/domain/types";

const API_BASE = "https://maps.googleapis.com/maps/api";

const LatLngSchema = z.object({ lat: z.number(), lng: z.number() });

const GeocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        formatted_address: z.string().optional(),
        geometry: z.object({ location: LatLngSchema }),
      })
    )
    .default([]),
});

const DistanceMatrixResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  rows: z
    .array(
      z.object({
        elements: z.array(
          z.object({
            status: z.string(),
            duration: z.object({ value: z.number() }).optional(),
          })
        ),
      })
    )
    .default([]),
});

const PlacesResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        name: z.string(),
        geometry: z.object({ location: LatLngSchema }),
      })
    )
    .default([]),
});

export interface GoogleMapsOptions {
  apiKey?: string;
  /** Region bias for geocoding (ccTLD, default "no") */
  region?: string;
  fetchOptions?: FetchPolicyOptions;
}

export class GoogleMapsClient implements Geocoder, DistanceProvider, PlacesProvider {
  private readonly apiKey: string | undefined;
  private readonly region: string;
  private readonly fetchOptions: FetchPolicyOptions;

  constructor(opts: GoogleMapsOptions = {}) {
    this.apiKey = opts.apiKey || process.env.GOOGLE_MAPS_API_KEY;
    this.region = opts.region ?? "no";
    this.fetchOptions = opts.fetchOptions ?? {};
  }

  private async request(endpoint: string, params: Record<string, string>): Promise<unknown> {
    if (!this.apiKey) {
      throw new ConfigError("GOOGLE_MAPS_API_KEY not set. Add it to .env.");
    }
    const query = new URLSearchParams({ ...params, key: this.apiKey });
    const result = await fetchWithPolicy(`${API_BASE}/${endpoint}/json?${query}`, this.fetchOptions);
    if (result.httpStatus !== 200) {
      throw new Error(
        `[maps] ${endpoint} HTTP ${result.httpStatus}: ${result.content.slice(0, 200)}`
      );
    }
    return JSON.parse(result.content);
  }

  async geocode(address: string): Promise<GeocodeOutcome> {
    let body: z.infer<typeof GeocodeResponseSchema>;
    try {
      body = GeocodeResponseSchema.parse(
        await this.request("geocode", { address, region: this.region })
      );
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      throw new GeocodeFailureError(address, err);
    }

    if (body.status === "ZERO_RESULTS") return { status: "not_found" };
    if (body.status !== "OK") {
      throw new GeocodeFailureError(
        address,
        new Error(`${body.status}${body.error_message ? `: ${body.error_message}` : ""}`)
      );
    }

    const candidates = body.results.map((r) => ({
      lat: r.geometry.location.lat,
      lng: r.geometry.location.lng,
      formattedAddress: r.formatted_address ?? null,
    }));

    if (candidates.length === 0) return { status: "not_found" };
    if (candidates.length > 1) return { status: "ambiguous", candidates };
    return {
      status: "ok",
      coordinates: { lat: candidates[0].lat, lng: candidates[0].lng },
      formattedAddress: candidates[0].formattedAddress,
    };
  }

  async travelMinutes(
    origin: Coordinates,
    destination: Coordinates,
    mode: TravelMode
  ): Promise<number> {
    let body: z.infer<typeof DistanceMatrixResponseSchema>;
    try {
      body = DistanceMatrixResponseSchema.parse(
        await this.request("distancematrix", {
          origins: `${origin.lat},${origin.lng}`,
          destinations: `${destination.lat},${destination.lng}`,
          mode,
        })
      );
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      throw new DistanceFailureError("Distance Matrix request failed", err);
    }

    const element = body.rows[0]?.elements[0];
    if (body.status !== "OK" || !element || element.status !== "OK" || !element.duration) {
      throw new DistanceFailureError(
        `No ${mode} route (${element?.status ?? body.status}${body.error_message ? `: ${body.error_message}` : ""})`
      );
    }
    return Math.round((element.duration.value / 60) * 10) / 10;
  }

  async search(keyword: string, near: Coordinates, radiusMeters: number): Promise<PlaceHit[]> {
    const body = PlacesResponseSchema.parse(
      await this.request("place/textsearch", {
        query: keyword,
        location: `${near.lat},${near.lng}`,
        radius: String(radiusMeters),
      })
    );
    if (body.status !== "OK" && body.status !== "ZERO_RESULTS") {
      throw new Error(`[maps] place search "${keyword}" failed: ${body.status}`);
    }
    return body.results.map((r) => ({ name: r.name, location: r.geometry.location }));
  }
}
