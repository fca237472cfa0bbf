import { describe, it, expect, vi, afterEach } from "vitest";
import { GoogleMapsClient } from "./googleMaps";
import { ConfigError, DistanceFailureError, GeocodeFailureError } from "@/lib/errors";

const OPTIONS = { apiKey: "test-key", fetchOptions: { skipRateLimit: true, maxRetries: 0 } };

function respondWith(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_url: string | URL | Request) =>
    new Response(JSON.stringify(body), { status })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestedUrl(fetchMock: ReturnType<typeof respondWith>): URL {
  const arg = fetchMock.mock.calls[0][0];
  return new URL(typeof arg === "string" ? arg : arg instanceof URL ? arg.href : arg.url);
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("GoogleMapsClient.geocode", () => {
  it("returns one match as ok", async () => {
    const fetchMock = respondWith({
      status: "OK",
      results: [
        { formatted_address: "Bogstadveien 50, 0366 Oslo, Norway", geometry: { location: { lat: 59.9284, lng: 10.7155 } } },
      ],
    });

    const outcome = await new GoogleMapsClient(OPTIONS).geocode("Bogstadveien 50, 0366 Oslo");

    expect(outcome).toEqual({
      status: "ok",
      coordinates: { lat: 59.9284, lng: 10.7155 },
      formattedAddress: "Bogstadveien 50, 0366 Oslo, Norway",
    });
    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe("/maps/api/geocode/json");
    expect(url.searchParams.get("address")).toBe("Bogstadveien 50, 0366 Oslo");
    expect(url.searchParams.get("key")).toBe("test-key");
  });

  it("biases geocoding to Norway unless another region is set", async () => {
    const defaultFetch = respondWith({ status: "ZERO_RESULTS", results: [] });
    await new GoogleMapsClient(OPTIONS).geocode("Storgata 1");
    expect(requestedUrl(defaultFetch).searchParams.get("region")).toBe("no");

    const swedishFetch = respondWith({ status: "ZERO_RESULTS", results: [] });
    await new GoogleMapsClient({ ...OPTIONS, region: "se" }).geocode("Storgatan 1");
    expect(requestedUrl(swedishFetch).searchParams.get("region")).toBe("se");
  });

  it("returns several matches as ambiguous", async () => {
    respondWith({
      status: "OK",
      results: [
        { formatted_address: "Parkveien 1, Oslo", geometry: { location: { lat: 59.91, lng: 10.73 } } },
        { geometry: { location: { lat: 60.39, lng: 5.32 } } },
      ],
    });

    expect(await new GoogleMapsClient(OPTIONS).geocode("Parkveien 1")).toEqual({
      status: "ambiguous",
      candidates: [
        { lat: 59.91, lng: 10.73, formattedAddress: "Parkveien 1, Oslo" },
        { lat: 60.39, lng: 5.32, formattedAddress: null },
      ],
    });
  });

  it("returns ZERO_RESULTS as not_found", async () => {
    respondWith({ status: "ZERO_RESULTS", results: [] });
    expect(await new GoogleMapsClient(OPTIONS).geocode("Nowhere 0")).toEqual({ status: "not_found" });
  });

  it("throws GeocodeFailureError on an API error", async () => {
    respondWith({ status: "REQUEST_DENIED", error_message: "bad key" });
    await expect(new GoogleMapsClient(OPTIONS).geocode("Storgata 1")).rejects.toThrow(GeocodeFailureError);
  });

  it("throws ConfigError without an API key", async () => {
    vi.stubEnv("GOOGLE_MAPS_API_KEY", "");
    await expect(new GoogleMapsClient({ fetchOptions: OPTIONS.fetchOptions }).geocode("Storgata 1")).rejects.toThrow(
      ConfigError
    );
    vi.unstubAllEnvs();
  });
});

describe("GoogleMapsClient.travelMinutes", () => {
  it("converts the transit duration to minutes", async () => {
    const fetchMock = respondWith({
      status: "OK",
      rows: [{ elements: [{ status: "OK", duration: { value: 1234 } }] }],
    });

    const minutes = await new GoogleMapsClient(OPTIONS).travelMinutes(
      { lat: 59.92, lng: 10.76 },
      { lat: 59.91, lng: 10.75 },
      "transit"
    );

    expect(minutes).toBe(20.6);
    const url = requestedUrl(fetchMock);
    expect(url.searchParams.get("mode")).toBe("transit");
    expect(url.searchParams.get("origins")).toBe("59.92,10.76");
  });

  it("asks for a walking route in walking mode", async () => {
    const fetchMock = respondWith({
      status: "OK",
      rows: [{ elements: [{ status: "OK", duration: { value: 360 } }] }],
    });

    const minutes = await new GoogleMapsClient(OPTIONS).travelMinutes(
      { lat: 59.92, lng: 10.76 },
      { lat: 59.923, lng: 10.759 },
      "walking"
    );

    expect(minutes).toBe(6);
    expect(requestedUrl(fetchMock).searchParams.get("mode")).toBe("walking");
  });

  it("throws DistanceFailureError when there is no route", async () => {
    respondWith({ status: "OK", rows: [{ elements: [{ status: "ZERO_RESULTS" }] }] });
    const attempt = new GoogleMapsClient(OPTIONS).travelMinutes({ lat: 0, lng: 0 }, { lat: 1, lng: 1 }, "transit");
    await expect(attempt).rejects.toThrow(DistanceFailureError);
    await expect(attempt).rejects.toThrow("No transit route (ZERO_RESULTS)");
  });
});

describe("GoogleMapsClient.search", () => {
  it("returns place names and locations", async () => {
    respondWith({
      status: "OK",
      results: [{ name: "Gym Grunerlokka", geometry: { location: { lat: 59.923, lng: 10.759 } } }],
    });

    expect(
      await new GoogleMapsClient(OPTIONS).search("gym", { lat: 59.92, lng: 10.76 }, 2000)
    ).toEqual([{ name: "Gym Grunerlokka", location: { lat: 59.923, lng: 10.759 } }]);
  });
});
