import "reflect-metadata";
import { createTRPCClient, httpBatchLink, TRPCClientError } from "@trpc/client";
import { Test } from "@nestjs/testing";
import { FastifyAdapter, type NestFastifyApplication } from "@nestjs/platform-fastify";
import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";

import type { RawPriceRecord } from "@spotwindow/domain";

import { AppModule } from "../../src/app.module";
import { PriceSourceService } from "../../src/config/price-source.service";
import { clearRuntimeConfig, setRuntimeConfig } from "../../src/config/runtime-config";
import type { ConfigDocument } from "../../src/config/schemas";
import { registerTrpc, TRPC_PREFIX } from "../../src/trpc/trpc.http";
import type { AppRouter } from "../../src/trpc/trpc.router";

const records: RawPriceRecord[] = [0, 0, 0, 0.4, 0.4].map((spotPrice, index) => ({
  time_start: new Date(Date.UTC(2025, 5, 9, 22 + index)).toISOString(),
  spot_price: spotPrice,
}));

type InjectMethod = "GET" | "POST";

function headersOf(init: { headers?: ConstructorParameters<typeof Headers>[0] } | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

describe("schedule tRPC", () => {
  let app: NestFastifyApplication;
  let fastify: FastifyInstance;
  let client: ReturnType<typeof createTRPCClient<AppRouter>>;

  beforeAll(async () => {
    const runtimeConfig: ConfigDocument = {
      logging: {level: "error"},
      price_source: {base_url: "https://prices.test/api/v1/prices"},
      schedule: {time_zone: "Europe/Stockholm", required_margin: 20, day: "2025-06-10"},
    };
    setRuntimeConfig(runtimeConfig);

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter({logger: false}), {logger: false});
    fastify = await registerTrpc(app);
    await app.init();

    client = createTRPCClient<AppRouter>({
      links: [
        httpBatchLink({
          url: TRPC_PREFIX,
          fetch: async (input, init) => {
            const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
            const method: InjectMethod = init?.method === "GET" ? "GET" : "POST";
            const body = init?.body;
            const response = await fastify.inject({
              method,
              url,
              headers: headersOf(init),
              payload: typeof body === "string" ? body : undefined,
            });

            const headers = new Headers();
            for (const [key, value] of Object.entries(response.headers)) {
              if (value !== undefined) {
                headers.set(key, Array.isArray(value) ? value.join(",") : String(value));
              }
            }
            return new Response(response.payload, {status: response.statusCode, headers});
          },
        }),
      ],
    });
  });

  afterAll(async () => {
    await app.close();
    clearRuntimeConfig();
  });

  test("reports health", async () => {
    await expect(client.health.query()).resolves.toEqual({status: "ok"});

    const response = await fastify.inject({method: "GET", url: `${TRPC_PREFIX}/health`});
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({result: {data: {status: "ok"}}});
  });

  test("exposes the resolved settings", async () => {
    const settings = await client.config.query();

    expect(settings.schedule.requiredMargin).toBe(20);
    expect(settings.source.baseUrl).toBe("https://prices.test/api/v1/prices");
  });

  test("computes a schedule from posted records", async () => {
    const response = await client.schedule.compute.mutate({records, day: "2025-06-10"});

    expect(response.lines).toEqual(["00:00-03:00/1234567/+", "03:00-05:00/1234567/-"]);
    expect(response.assignments[0]?.discharge_hours).toBe(2);
  });

  test("maps missing price data to NOT_FOUND", async () => {
    const attempt = client.schedule.compute.mutate({records: [], day: "2025-06-10"});

    await expect(attempt).rejects.toBeInstanceOf(TRPCClientError);
    await expect(attempt).rejects.toMatchObject({
      message: "No price data available for 2025-06-10",
      data: {code: "NOT_FOUND"},
    });
  });

  test("plans a day from the price source and serves it as latest", async () => {
    const fetchSpy = vi.spyOn(app.get(PriceSourceService), "fetchDay").mockResolvedValue(records);

    const planned = await client.schedule.forDay.mutate({day: "2025-06-10"});
    const latest = await client.schedule.latest.query();

    expect(fetchSpy).toHaveBeenCalledWith(expect.objectContaining({provider: "elprisetjustnu"}), "2025-06-10");
    expect(planned.lines).toEqual(["00:00-03:00/1234567/+", "03:00-05:00/1234567/-"]);
    expect(latest?.generated_at).toBe(planned.generated_at);
    fetchSpy.mockRestore();
  });

  test("rejects malformed day selectors", async () => {
    await expect(client.schedule.forDay.mutate({day: "next week"})).rejects.toMatchObject({
      data: {code: "BAD_REQUEST"},
    });
  });
});
