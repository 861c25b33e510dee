import type { Server } from "http";
import { createApp } from "../src/app";
import { adjustNetwork, examples } from "../src/examples";

describe("server", () => {
  let server: Server;
  let baseUrl: string;
  let consoleSpy: jest.SpyInstance;

  beforeAll((done) => {
    server = createApp().listen(0, () => {
      const address = server.address();
      baseUrl = typeof address === "object" && address ? `http://127.0.0.1:${address.port}` : "";
      done();
    });
  });

  afterAll((done) => {
    server.close(done);
  });

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it("should report health", async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok" });
  });

  it("should list the example networks", async () => {
    const response = await fetch(`${baseUrl}/networks`);
    expect(await response.json()).toEqual({
      networks: ["two-roads", "three-way-junction", "highway-exit", "lane-merge"],
    });
  });

  it("should serve a network as OpenDRIVE", async () => {
    const response = await fetch(`${baseUrl}/networks/two-roads.xodr`);
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toMatch(/^application\/xml/);
    const body = await response.text();
    expect(body).toContain('<header name="two-roads" revMajor="1" revMinor="5"');
    expect(body).toContain('<road id="2" junction="-1"');
  });

  it("should return 404 for an unknown network", async () => {
    const response = await fetch(`${baseUrl}/networks/missing.xodr`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Unknown network missing" });
  });

  it("should return 404 for unknown paths", async () => {
    const response = await fetch(`${baseUrl}/roads`);
    expect(response.status).toBe(404);
  });
});

describe("examples", () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it.each([...examples.keys()])("should adjust %s", (name) => {
    const build = examples.get(name);
    expect(build).toBeDefined();
    const network = build ? adjustNetwork(build()) : undefined;
    expect(network?.toXml()).toContain("<OpenDRIVE>");
  });

  it("should blend the banked curve into the straights on either side", () => {
    const build = examples.get("two-roads");
    const network = build ? adjustNetwork(build()) : undefined;
    const curve = network?.roads.get(2);
    const length = curve?.length ?? 0;
    expect(curve?.elevationProfile.evalAt(0)).toBeCloseTo(2, 10);
    expect(curve?.elevationProfile.evalAt(length)).toBeCloseTo(5, 10);
    expect(network?.roads.get(3)?.lateralProfile.superelevationAt(0)).toBeCloseTo(0.05, 12);
  });

  it("should place the exit ramp beside the highway", () => {
    const build = examples.get("highway-exit");
    const network = build ? build() : undefined;
    network?.adjustRoadsAndLanes();
    const start = network?.roads.get(3)?.requirePlanview().getStartPoint();
    expect(start?.x).toBeCloseTo(200, 10);
    expect(start?.y).toBeCloseTo(-6, 10);
  });

  it("should connect every pair of the three-way junction", () => {
    const build = examples.get("three-way-junction");
    const network = build ? build() : undefined;
    expect(network?.roads.size).toBe(6);
    expect(network?.junctions[0].connections).toHaveLength(6);
  });
});
