import { beforeEach, describe, expect, it, vi } from "vitest";
import { CredentialStore } from "../../credentials/credential-store.js";
import { ContainerOrchestrator } from "../../orchestrator/container-orchestrator.js";
import { FakeRuntime } from "../../test/fake-runtime.js";
import { createWebhookRoutes, SECRET_HEADER } from "./webhook.js";

vi.mock("../../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
  shortId: (id: string) => id,
}));

const LABEL = "io.d2a.yadwh.ug";
const SECRET = "abcdefghijkl";

describe("webhook routes", () => {
  let runtime: FakeRuntime;
  let routes: ReturnType<typeof createWebhookRoutes>;

  beforeEach(() => {
    runtime = new FakeRuntime();
    runtime.addContainer({ id: "c-api", name: "api", image: "api:1", labels: { [LABEL]: "BACKEND_PROD" } });
    const credentials = new CredentialStore([{ name: "BACKEND_PROD", secret: SECRET, purgeOldImage: false }]);
    const orchestrator = new ContainerOrchestrator(runtime, credentials, { labelKey: LABEL, stopTimeoutSeconds: 60 });
    routes = createWebhookRoutes(orchestrator);
  });

  describe("secret in the path", () => {
    it("returns the replacement descriptors", async () => {
      const res = await routes.request(`/BACKEND_PROD/${SECRET}`);
      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toHaveLength(1);
      expect(body[0].id).toBe("container-1");
      expect(body[0].names).toEqual(["/api"]);
    });

    it("returns 401 for a wrong secret", async () => {
      const res = await routes.request("/BACKEND_PROD/short");
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "secret mismatch" });
      expect(runtime.calls).toEqual([]);
    });

    it("returns 404 for an unknown group", async () => {
      const res = await routes.request(`/UNKNOWN_GROUP/${SECRET}`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "webhook not found" });
      expect(runtime.calls).toEqual([]);
    });
  });

  describe("secret by query, header or body", () => {
    it("accepts the secret as a query parameter", async () => {
      const res = await routes.request(`/BACKEND_PROD?secret=${SECRET}`);
      expect(res.status).toBe(200);
    });

    it("accepts the secret header", async () => {
      const res = await routes.request("/BACKEND_PROD", { headers: { [SECRET_HEADER]: SECRET } });
      expect(res.status).toBe(200);
    });

    it("accepts the secret as the request body", async () => {
      const res = await routes.request("/BACKEND_PROD", { method: "POST", body: SECRET });
      expect(res.status).toBe(200);
      expect(await res.json()).toHaveLength(1);
    });

    it("prefers the query parameter over the header", async () => {
      const res = await routes.request("/BACKEND_PROD?secret=wrong-secret-value", {
        headers: { [SECRET_HEADER]: SECRET },
      });
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "secret mismatch" });
    });

    it("returns 401 when no secret is supplied", async () => {
      const res = await routes.request("/BACKEND_PROD", { method: "POST" });
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "secret not found" });
      expect(runtime.calls).toEqual([]);
    });
  });

  it("returns an empty array when no container is in the group", async () => {
    runtime.containers.clear();
    const res = await routes.request(`/BACKEND_PROD/${SECRET}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([]);
  });

  it("lists only the containers that were replaced", async () => {
    runtime.addContainer({ id: "c-worker", name: "worker", image: "worker:1", labels: { [LABEL]: "backend_prod" } });
    runtime.failOn("pull", "api:1");

    const res = await routes.request(`/BACKEND_PROD/${SECRET}`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.map((c: { names: string[] }) => c.names)).toEqual([["/worker"]]);
  });

  it("returns 500 when containers cannot be listed", async () => {
    runtime.failOn("list", "*", "connect ENOENT /var/run/docker.sock");

    const res = await routes.request(`/BACKEND_PROD/${SECRET}`);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: `Cannot list containers with label ${LABEL}: connect ENOENT /var/run/docker.sock`,
    });
  });
});
