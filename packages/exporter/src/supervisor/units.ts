import type { SupervisedUnit } from "./supervisor.js";
import type { EventWatcher } from "../watch/event-watcher.js";
import type { ResourceVersion } from "@pod-event-exporter/shared";

/** The watch loop as a supervised unit; FatalWatchError fails it */
export function watchUnit(watcher: EventWatcher, initialBookmark?: ResourceVersion): SupervisedUnit {
  return {
    name: "watch",
    run: (signal) => watcher.run(initialBookmark, signal),
  };
}

/**
 * An already listening server as a supervised unit: it idles until
 * shutdown, then closes the server.
 */
export function serverUnit(name: string, server: { close(): Promise<unknown> }): SupervisedUnit {
  return {
    name,
    run: async (signal) => {
      await untilAborted(signal);
      await server.close();
    },
  };
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
