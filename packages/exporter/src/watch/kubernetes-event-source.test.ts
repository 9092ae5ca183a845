import { describe, it, expect, vi } from "vitest";
import {
  KubernetesEventSource,
  actionForReason,
  statusError,
  toRawEvent,
  type WatchClient,
} from "./kubernetes-event-source.js";
import { WatchAuthError, WatchExpiredError, classifyWatchError } from "./errors.js";
import { EventWatcher } from "./event-watcher.js";
import { PodMetricsRegistry } from "../metrics/pod-metrics-registry.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type WatchArgs = Parameters<WatchClient["watch"]>;

/** A Watch stand-in that records each request and hands out controllers */
function fakeWatch() {
  const calls: WatchArgs[] = [];
  const controllers: AbortController[] = [];
  const client: WatchClient = {
    watch: async (...args: WatchArgs) => {
      calls.push(args);
      const controller = new AbortController();
      controllers.push(controller);
      return controller;
    },
  };
  return { client, calls, controllers };
}

function handlers() {
  return { onEvent: vi.fn(), onBookmark: vi.fn() };
}

/** A core/v1 Event about a pod, as the API server sends it */
function kubeEvent(reason: string, resourceVersion: string, firstTimestamp = "2026-01-01T00:00:00Z") {
  return {
    apiVersion: "v1",
    kind: "Event",
    metadata: { name: "web-1.17f1", namespace: "default", resourceVersion },
    involvedObject: { kind: "Pod", namespace: "default", name: "web-1", uid: "uid-1" },
    reason,
    message: "Event message for default/web-1",
    firstTimestamp,
    lastTimestamp: firstTimestamp,
    count: 1,
  };
}

const POD_BODY = { metadata: { namespace: "default", name: "web-1", uid: "uid-1" } };

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

describe("KubernetesEventSource requests", () => {
  it("watches events cluster-wide by default", () => {
    const { client, calls } = fakeWatch();
    const source = new KubernetesEventSource(client);

    void source.stream({ signal: new AbortController().signal }, handlers());

    expect(source.watchPath).toBe("/api/v1/events");
    expect(calls[0][0]).toBe("/api/v1/events");
  });

  it("watches a single namespace when configured", () => {
    const source = new KubernetesEventSource(fakeWatch().client, { namespace: "kube-system" });
    expect(source.watchPath).toBe("/api/v1/namespaces/kube-system/events");
  });

  it("asks for bookmarks and a server-side timeout", () => {
    const { client, calls } = fakeWatch();
    const source = new KubernetesEventSource(client, { timeoutSeconds: 60 });

    void source.stream({ signal: new AbortController().signal }, handlers());
    void source.stream({ resourceVersion: "123", signal: new AbortController().signal }, handlers());

    expect(calls[0][1]).toEqual({ allowWatchBookmarks: true, timeoutSeconds: 60 });
    expect(calls[1][1]).toEqual({
      allowWatchBookmarks: true,
      timeoutSeconds: 60,
      resourceVersion: "123",
    });
  });

  it("does not open a request when the signal is already aborted", async () => {
    const { client, calls } = fakeWatch();
    const source = new KubernetesEventSource(client);

    await expect(source.stream({ signal: AbortSignal.abort() }, handlers())).resolves.toBeUndefined();
    expect(calls).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Notifications
// ---------------------------------------------------------------------------

describe("KubernetesEventSource notifications", () => {
  it("reads the pod action from the Event reason", () => {
    const { client, calls } = fakeWatch();
    const h = handlers();
    void new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, h);
    const callback = calls[0][2];

    callback("ADDED", kubeEvent("Scheduled", "500"));
    callback("ADDED", kubeEvent("Pulled", "501", "2026-01-01T00:00:02Z"));
    callback("MODIFIED", kubeEvent("BackOff", "502", "2026-01-01T00:00:03Z"));
    callback("ADDED", kubeEvent("Killing", "503", "2026-01-01T00:05:00Z"));

    expect(h.onEvent.mock.calls.map(([e]) => e)).toEqual([
      {
        kind: "Pod",
        action: "Added",
        resourceVersion: "500",
        body: POD_BODY,
        reason: "Scheduled",
        eventTime: "2026-01-01T00:00:00.000Z",
      },
      {
        kind: "Pod",
        action: "Modified",
        resourceVersion: "501",
        body: POD_BODY,
        reason: "Pulled",
        eventTime: "2026-01-01T00:00:02.000Z",
      },
      {
        kind: "Pod",
        action: "Modified",
        resourceVersion: "502",
        body: POD_BODY,
        reason: "BackOff",
        eventTime: "2026-01-01T00:00:03.000Z",
      },
      {
        kind: "Pod",
        action: "Deleted",
        resourceVersion: "503",
        body: POD_BODY,
        reason: "Killing",
        eventTime: "2026-01-01T00:05:00.000Z",
      },
    ]);
  });

  it("only moves the bookmark when an Event record is garbage-collected", () => {
    const { client, calls } = fakeWatch();
    const h = handlers();
    void new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, h);

    calls[0][2]("DELETED", kubeEvent("Scheduled", "700"));

    expect(h.onEvent).not.toHaveBeenCalled();
    expect(h.onBookmark).toHaveBeenCalledWith("700");
  });

  it("accepts Events whose first timestamp is null", () => {
    const { client, calls } = fakeWatch();
    const h = handlers();
    void new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, h);

    calls[0][2]("ADDED", {
      ...kubeEvent("Created", "800"),
      firstTimestamp: null,
      eventTime: "2026-01-01T00:00:01.250000Z",
    });

    expect(h.onEvent).toHaveBeenCalledWith({
      kind: "Pod",
      action: "Added",
      resourceVersion: "800",
      body: POD_BODY,
      reason: "Created",
      eventTime: "2026-01-01T00:00:01.250Z",
    });
  });

  it("passes bookmarks on without producing events", () => {
    const { client, calls } = fakeWatch();
    const h = handlers();
    void new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, h);

    calls[0][2]("BOOKMARK", { kind: "Event", metadata: { resourceVersion: "900" } });

    expect(h.onBookmark).toHaveBeenCalledWith("900");
    expect(h.onEvent).not.toHaveBeenCalled();
  });

  it("ignores notifications after the stream has ended", async () => {
    const { client, calls } = fakeWatch();
    const h = handlers();
    const stream = new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, h);

    calls[0][3](null);
    await stream;
    calls[0][2]("ADDED", kubeEvent("Created", "600"));

    expect(h.onEvent).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Termination
// ---------------------------------------------------------------------------

describe("KubernetesEventSource termination", () => {
  it("resolves when the server closes the stream cleanly", async () => {
    const { client, calls } = fakeWatch();
    const stream = new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, handlers());

    calls[0][3](null);

    await expect(stream).resolves.toBeUndefined();
  });

  it("rejects with the transport error", async () => {
    const { client, calls } = fakeWatch();
    const stream = new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, handlers());
    const failure = new Error("socket hang up");

    calls[0][3](failure);

    await expect(stream).rejects.toBe(failure);
  });

  it("rejects with WatchExpiredError on a 410 status and closes the request", async () => {
    const { client, calls, controllers } = fakeWatch();
    const stream = new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, handlers());

    calls[0][2]("ERROR", {
      kind: "Status",
      status: "Failure",
      code: 410,
      reason: "Expired",
      message: "too old resource version: 100 (200)",
    });

    await expect(stream).rejects.toBeInstanceOf(WatchExpiredError);
    await expect(stream).rejects.toThrow("too old resource version: 100 (200)");
    expect(controllers[0].signal.aborted).toBe(true);
  });

  it("rejects with WatchAuthError on a 403 status", async () => {
    const { client, calls } = fakeWatch();
    const stream = new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, handlers());

    calls[0][2]("ERROR", { kind: "Status", code: 403, reason: "Forbidden", message: "events is forbidden" });

    await expect(stream).rejects.toMatchObject({ name: "WatchAuthError", statusCode: 403 });
  });

  it("rejects when the request itself fails", async () => {
    const unauthorized = Object.assign(new Error("Unauthorized"), { statusCode: 401 });
    const client: WatchClient = {
      watch: async () => {
        throw unauthorized;
      },
    };

    const stream = new KubernetesEventSource(client).stream({ signal: new AbortController().signal }, handlers());

    const error: unknown = await stream.catch((err: unknown) => err);
    expect(error).toBe(unauthorized);
    expect(classifyWatchError(error)).toBe("auth");
  });

  it("resolves and closes the request when the signal aborts", async () => {
    const { client, controllers } = fakeWatch();
    const controller = new AbortController();
    const stream = new KubernetesEventSource(client).stream({ signal: controller.signal }, handlers());

    controller.abort();

    await expect(stream).resolves.toBeUndefined();
    expect(controllers[0].signal.aborted).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Mapping helpers
// ---------------------------------------------------------------------------

describe("actionForReason", () => {
  it("maps creation and removal reasons, and treats the rest as updates", () => {
    expect(actionForReason("Scheduled")).toBe("Added");
    expect(actionForReason("Created")).toBe("Added");
    expect(actionForReason("Killing")).toBe("Deleted");
    expect(actionForReason("Started")).toBe("Modified");
    expect(actionForReason(undefined)).toBe("Modified");
  });
});

describe("toRawEvent", () => {
  it("leaves fields empty for objects of an unexpected shape", () => {
    expect(toRawEvent("not an object")).toEqual({
      kind: "",
      action: "Modified",
      resourceVersion: "",
      body: { metadata: { namespace: undefined, name: undefined, uid: undefined } },
    });
  });
});

describe("statusError", () => {
  it("falls back to the reason when the status has no message", () => {
    const error = statusError({ code: 500, reason: "InternalError" });
    expect(error).not.toBeInstanceOf(WatchExpiredError);
    expect(error).not.toBeInstanceOf(WatchAuthError);
    expect(error.message).toBe("Watch error: InternalError");
  });

  it("recognises an expiry by its reason alone", () => {
    expect(statusError({ reason: "Gone" })).toBeInstanceOf(WatchExpiredError);
  });
});

// ---------------------------------------------------------------------------
// With the watch loop
// ---------------------------------------------------------------------------

describe("KubernetesEventSource feeding an EventWatcher", () => {
  it("counts a pod's lifecycle from its Events, not from Event garbage collection", async () => {
    const { client, calls } = fakeWatch();
    const registry = new PodMetricsRegistry();
    const watcher = new EventWatcher(new KubernetesEventSource(client), registry, {
      now: () => new Date("2026-01-01T00:10:00.000Z"),
    });

    const done = watcher.run();
    await vi.waitFor(() => expect(calls).toHaveLength(1));
    const callback = calls[0][2];
    callback("ADDED", kubeEvent("Scheduled", "1"));
    callback("ADDED", kubeEvent("Created", "2", "2026-01-01T00:00:01Z"));
    callback("ADDED", kubeEvent("Started", "3", "2026-01-01T00:00:02Z"));
    callback("ADDED", kubeEvent("Killing", "4", "2026-01-01T00:05:00Z"));
    // An hour later the Event records expire
    callback("DELETED", kubeEvent("Scheduled", "5"));
    callback("DELETED", kubeEvent("Killing", "6", "2026-01-01T00:05:00Z"));

    watcher.stop();
    await done;

    expect(registry.snapshot().map((s) => [s.pod, s.action, s.count])).toEqual([
      ["default/web-1", "Added", 2],
      ["default/web-1", "Modified", 1],
      ["default/web-1", "Deleted", 1],
    ]);
    expect(registry.lifecycleSnapshot()).toEqual([
      { lifecycle: "created", podId: "uid-1", eventTime: "2026-01-01T00:00:01.000Z", count: 1 },
      { lifecycle: "deleted", podId: "uid-1", eventTime: "2026-01-01T00:05:00.000Z", count: 1 },
    ]);
    expect(watcher.bookmark).toBe("6");
  });
});
