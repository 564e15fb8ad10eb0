import { describe, expect, it, vi } from "vitest";
import {
  createLogger,
  getLogger,
  redisLikeServiceUri,
  startDependencies,
  TimeoutExceededError,
  type AppConfig,
  type ComposeProject,
  type ComposeRuntime,
  type ServiceEndpoints
} from "../src";

const logger = createLogger({ level: "silent" });

const endpoints: ServiceEndpoints = {
  host: () => "127.0.0.1",
  portFor: (service, containerPort) => (service === "redis" ? 50000 : 51000) + containerPort - 6379 + 1
};

const config: AppConfig = {
  compose: { directory: "/srv/compose", file: "docker-compose-test.linux.yaml", projectName: "compose-ready-demo" },
  readiness: { timeout: 30, pause: 5, connectTimeout: 100 },
  logLevel: "silent"
};

function fakeRuntime(): ComposeRuntime & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async up(project: ComposeProject) {
      calls.push(`up ${project.projectName}`);
      return endpoints;
    },
    async down(project: ComposeProject) {
      calls.push(`down ${project.projectName}`);
    }
  };
}

describe("redisLikeServiceUri", () => {
  it("returns the URI of the service once it answers", async () => {
    const check = vi.fn<() => Promise<boolean>>().mockResolvedValueOnce(false).mockResolvedValue(true);
    const probe = vi.fn(() => check);

    const uri = await redisLikeServiceUri(endpoints, "redis", { timeout: 1000, pause: 1, probe, logger });

    expect(uri).toBe("redis://127.0.0.1:50001");
    expect(probe).toHaveBeenCalledWith("redis://127.0.0.1:50001");
    expect(check).toHaveBeenCalledTimes(2);
  });

  it("names the service in the timeout error", async () => {
    await expect(
      redisLikeServiceUri(endpoints, "keydb", { timeout: 0, pause: 1, probe: () => async () => false, logger })
    ).rejects.toThrow("Timed out after 0ms waiting for keydb to become ready (1 attempts)");
  });
});

describe("startDependencies", () => {
  it("starts the project and resolves both services", async () => {
    const runtime = fakeRuntime();

    const dependencies = await startDependencies(config, { runtime, probe: () => async () => true, logger });

    expect(dependencies.redisUri).toBe("redis://127.0.0.1:50001");
    expect(dependencies.keydbUri).toBe("redis://127.0.0.1:51001");
    expect(runtime.calls).toEqual(["down compose-ready-demo", "up compose-ready-demo"]);

    await dependencies.session.stop();
    expect(runtime.calls).toEqual(["down compose-ready-demo", "up compose-ready-demo", "down compose-ready-demo"]);
  });

  it("tears the project down when a service never becomes ready", async () => {
    const runtime = fakeRuntime();
    const probe = (uri: string) => async () => uri.endsWith(":50001");

    await expect(startDependencies(config, { runtime, probe, logger })).rejects.toBeInstanceOf(TimeoutExceededError);
    expect(runtime.calls).toEqual(["down compose-ready-demo", "up compose-ready-demo", "down compose-ready-demo"]);
  });

  it("stops waiting when the session is cancelled", async () => {
    const runtime = fakeRuntime();
    const controller = new AbortController();
    controller.abort(new Error("interrupted"));

    await expect(
      startDependencies(config, { runtime, probe: () => async () => true, logger, signal: controller.signal })
    ).rejects.toThrow("interrupted");
    expect(runtime.calls).toEqual(["down compose-ready-demo", "up compose-ready-demo", "down compose-ready-demo"]);
  });

  it("logs through a child of the root logger at the configured level", async () => {
    const childSpy = vi.spyOn(getLogger(), "child");

    const dependencies = await startDependencies(config, { runtime: fakeRuntime(), probe: () => async () => true });

    expect(childSpy).toHaveBeenCalledWith({ component: "dependencies" }, { level: "silent" });
    await dependencies.session.stop();
    childSpy.mockRestore();
  });
});
