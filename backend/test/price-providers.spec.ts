import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { PriceAcquisitionError } from "@spotwindow/domain";

import { PriceSourceService } from "../src/config/price-source.service";
import { ElprisetJustNuProvider } from "../src/config/providers/elprisetjustnu.provider";
import { FilePriceProvider } from "../src/config/providers/file.provider";
import type { PriceSourceSettings } from "../src/config/providers/provider.types";
import { buildDayUrl } from "../src/config/providers/provider.utils";
import { parsePricePayload } from "../src/config/schemas";

const settings: PriceSourceSettings = {
  provider: "elprisetjustnu",
  baseUrl: "https://prices.test/api/v1/prices",
  zone: "SE3",
  currency: "SEK",
  timeoutMs: 1000,
  file: null,
};

const FIXTURE = join(__dirname, "fixtures", "prices-{day}.json");

function createResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: {"Content-Type": "application/json"},
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildDayUrl", () => {
  it("places year, month-day and zone the way the feed names its files", () => {
    expect(buildDayUrl(settings, "2025-06-10")).toBe("https://prices.test/api/v1/prices/2025/06-10_SE3.json");
  });

  it("rejects an invalid day", () => {
    expect(() => buildDayUrl(settings, "2025-02-30")).toThrow("Invalid day '2025-02-30'");
  });
});

describe("parsePricePayload", () => {
  const entry = {
    SEK_per_kWh: 0.52,
    EUR_per_kWh: 0.047,
    EXR: 11.06,
    time_start: "2025-06-10T00:00:00+02:00",
    time_end: "2025-06-10T01:00:00+02:00",
  };

  it("picks the configured currency column", () => {
    expect(parsePricePayload([entry], "SEK")).toEqual([
      {time_start: "2025-06-09T22:00:00.000Z", time_end: "2025-06-09T23:00:00.000Z", spot_price: 0.52},
    ]);
    expect(parsePricePayload([entry], "EUR")[0]?.spot_price).toBe(0.047);
  });

  it("accepts plain spot price records", () => {
    expect(parsePricePayload([{time_start: "2025-06-09T22:00:00Z", spot_price: "0,3"}], "SEK")).toEqual([
      {time_start: "2025-06-09T22:00:00.000Z", spot_price: 0.3},
    ]);
  });

  it("rejects anything else", () => {
    expect(() => parsePricePayload({prices: []}, "SEK")).toThrow("Unrecognised price payload");
  });
});

describe("ElprisetJustNuProvider", () => {
  const provider = new ElprisetJustNuProvider();

  it("downloads and converts the day file", async () => {
    const fetchSpy = vi.spyOn(global, "fetch").mockResolvedValue(createResponse([
      {SEK_per_kWh: 0.25, EUR_per_kWh: 0.023, time_start: "2025-06-10T00:00:00+02:00", time_end: "2025-06-10T01:00:00+02:00"},
    ]));

    const records = await provider.fetchDay({day: "2025-06-10", settings});

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0]?.[0]).toBe("https://prices.test/api/v1/prices/2025/06-10_SE3.json");
    expect(records).toEqual([
      {time_start: "2025-06-09T22:00:00.000Z", time_end: "2025-06-09T23:00:00.000Z", spot_price: 0.25},
    ]);
  });

  it("wraps HTTP failures in PriceAcquisitionError", async () => {
    vi.spyOn(global, "fetch").mockResolvedValue(createResponse({message: "missing"}, 404, "Not Found"));

    const attempt = provider.fetchDay({day: "2025-06-10", settings});

    await expect(attempt).rejects.toBeInstanceOf(PriceAcquisitionError);
    await expect(attempt).rejects.toThrow("Failed to fetch prices for 2025-06-10: HTTP 404 Not Found");
  });

  it("gives up when the feed does not answer in time", async () => {
    vi.spyOn(global, "fetch").mockImplementation((_input, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    }));

    const attempt = provider.fetchDay({day: "2025-06-10", settings: {...settings, timeoutMs: 20}});

    await expect(attempt).rejects.toBeInstanceOf(PriceAcquisitionError);
    await expect(attempt).rejects.toThrow("Failed to fetch prices for 2025-06-10: Request timed out after 20 ms");
  });

  it("wraps unreadable payloads in PriceAcquisitionError", async () => {
    vi.spyOn(global, "fetch").mockResolvedValue(createResponse({unexpected: true}));

    await expect(provider.fetchDay({day: "2025-06-10", settings})).rejects.toThrow(
      "Price feed answered with an unreadable payload: Unrecognised price payload",
    );
  });
});

describe("FilePriceProvider", () => {
  const provider = new FilePriceProvider();

  it("reads the day file named by the template", async () => {
    const records = await provider.fetchDay({day: "2025-06-10", settings: {...settings, provider: "file", file: FIXTURE}});

    expect(records).toHaveLength(5);
    expect(records[3]).toEqual({
      time_start: "2025-06-10T01:00:00.000Z",
      time_end: "2025-06-10T02:00:00.000Z",
      spot_price: 0.4,
    });
  });

  it("reports a missing file as PriceAcquisitionError", async () => {
    const path = join(__dirname, "fixtures", "prices-2025-06-11.json");

    await expect(
      provider.fetchDay({day: "2025-06-11", settings: {...settings, provider: "file", file: FIXTURE}}),
    ).rejects.toThrow(`Failed to read prices from ${path}`);
  });
});

describe("PriceSourceService", () => {
  it("selects the provider named in the settings", () => {
    const service = new PriceSourceService();

    expect(service.createProvider(settings).key).toBe("elprisetjustnu");
    expect(service.createProvider({...settings, provider: "file"}).key).toBe("file");
  });

  it("returns the provider's records", async () => {
    const records = await new PriceSourceService().fetchDay(
      {...settings, provider: "file", file: FIXTURE},
      "2025-06-10",
    );

    expect(records.map((record) => record.spot_price)).toEqual([0, 0, 0, 0.4, 0.4]);
  });
});
