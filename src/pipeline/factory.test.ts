import axios from "axios";
import { vol } from "memfs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { defaultConfig, mergeLayers, validateConfig } from "../config";
import { FakeBrowser } from "../session/testing";
import { Classification, type Target } from "../types";
import type { Logger } from "../utils/logger";
import { createPipeline } from "./factory";
import { PipelineRunStatus } from "./types";

vi.mock("axios");
vi.mock("node:fs/promises", () => ({ default: vol.promises }));
const mockedAxios = vi.mocked(axios, true);

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const config = validateConfig(
  mergeLayers(defaultConfig("/work"), {
    concurrency: { probe: 1, capture: 2 },
    paths: { policyCache: "/cache" },
  }),
  "/work",
);

const targets: Target[] = [
  { id: "a1", url: "http://good.test/", displayName: "Good" },
  { id: "a2", url: "http://down.test/", displayName: "Down" },
];

describe("createPipeline", () => {
  let browser: FakeBrowser;

  beforeEach(() => {
    vol.reset();
    mockedAxios.get.mockReset();
    browser = new FakeBrowser();
  });

  it("should probe, capture and write the collections of a run", async () => {
    mockedAxios.get
      // probe a1, probe a2, then robots.txt of good.test
      .mockResolvedValueOnce({ status: 200, data: "<html></html>" })
      .mockRejectedValueOnce(
        Object.assign(new Error("getaddrinfo ENOTFOUND down.test"), { code: "ENOTFOUND" }),
      )
      .mockResolvedValueOnce({ status: 404, data: "" });

    const pipeline = createPipeline(config, createMockLogger(), async () => browser);
    const summary = await pipeline.run(targets);

    expect(summary.status).toBe(PipelineRunStatus.COMPLETED);
    expect(summary.up.map((r) => r.id)).toEqual(["a1"]);
    expect(summary.down).toEqual([
      {
        id: "a2",
        url: "http://down.test/",
        displayName: "Down",
        statusCode: null,
        artifactPath: null,
        error: "ClientError for http://down.test/: getaddrinfo ENOTFOUND down.test",
        classification: Classification.Down,
      },
    ]);
    expect(summary.success.map((r) => r.artifactPath)).toEqual([
      "/work/output/screenshots/good.test/front_page_Good_a1.jpeg",
    ]);
    expect(browser.navigations.map((n) => n.url)).toEqual(["http://good.test/"]);
    expect(browser.isConnected()).toBe(false);
    expect(Object.keys(vol.toJSON("/work/output/csv")).sort()).toEqual([
      "/work/output/csv/bad_response_urls.csv",
      "/work/output/csv/good_response_urls.csv",
      "/work/output/csv/output_urls.csv",
    ]);
  });

  it("should find nothing to do on a second run over the same targets", async () => {
    mockedAxios.get
      .mockResolvedValueOnce({ status: 200, data: "" })
      .mockRejectedValueOnce(Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" }))
      .mockResolvedValueOnce({ status: 404, data: "" });
    await createPipeline(config, createMockLogger(), async () => browser).run(targets);
    mockedAxios.get.mockClear();

    const summary = await createPipeline(config, createMockLogger(), async () => new FakeBrowser()).run(
      targets,
    );

    expect(summary.status).toBe(PipelineRunStatus.NOTHING_TO_PROCESS);
    expect(summary.skipped).toBe(2);
    expect(mockedAxios.get).not.toHaveBeenCalled();
  });

  it("should persist capture failures when cancelled after a navigation succeeds", async () => {
    mockedAxios.get.mockResolvedValue({ status: 200, data: "" });
    const controller = new AbortController();
    browser.behavior = async () => {
      controller.abort();
      return { status: () => 200 };
    };

    const summary = await createPipeline(config, createMockLogger(), async () => browser).run(
      [
        { id: "b1", url: "http://one.test/", displayName: "One" },
        { id: "b2", url: "http://two.test/", displayName: "Two" },
      ],
      { signal: controller.signal },
    );

    expect(summary.status).toBe(PipelineRunStatus.CANCELLED);
    expect(summary.success).toEqual([]);
    expect(summary.failure.map((r) => r.id).sort()).toEqual(["b1", "b2"]);
    expect(browser.screenshots).toEqual([]);
    expect(Object.keys(vol.toJSON("/work/output/csv")).sort()).toEqual([
      "/work/output/csv/good_response_urls.csv",
      "/work/output/csv/screenshot_failed_urls.csv",
    ]);
  });
});
