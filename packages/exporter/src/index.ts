import { KubeConfig } from "@kubernetes/client-node";

import { buildExporter } from "./app.js";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { PodMetricsRegistry } from "./metrics/index.js";
import { Supervisor, serverUnit, watchUnit } from "./supervisor/index.js";
import { EventWatcher, KubernetesEventSource, describeError } from "./watch/index.js";

// Config
let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  const logger = createLogger({ level: "info", pretty: false });
  logger.fatal({ problems: err instanceof ConfigError ? err.problems : undefined }, describeError(err));
  process.exit(1);
}

const logger = createLogger({ level: config.logLevel, pretty: !config.production });

// Cluster credentials (in-cluster service account, or KUBECONFIG / ~/.kube/config)
const kubeConfig = new KubeConfig();
try {
  kubeConfig.loadFromDefault();
} catch (err) {
  logger.fatal({ err }, "Failed to load Kubernetes configuration");
  process.exit(1);
}

// Shared registry: the watcher writes, the exporter reads
const podMetrics = new PodMetricsRegistry();

const source = KubernetesEventSource.fromKubeConfig(kubeConfig, {
  namespace: config.watch.namespace,
  timeoutSeconds: config.watch.timeoutSeconds,
});
const watcher = new EventWatcher(source, podMetrics, {
  initialBackoffMs: config.watch.initialBackoffMs,
  maxBackoffMs: config.watch.maxBackoffMs,
  backoffResetMs: config.watch.backoffResetMs,
  maxRetries: config.watch.maxRetries,
  authFailureLimit: config.watch.authFailureLimit,
  logger: logger.child({ component: "watch" }),
});

const app = await buildExporter({
  podMetrics,
  logger: logger.child({ component: "http" }),
  metrics: config.metrics,
});

// Binding the port is the last startup step that may fail
try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  logger.fatal({ err }, "Failed to start metrics server");
  process.exit(1);
}
logger.info(
  { namespace: config.watch.namespace ?? "(all)", watchPath: source.watchPath },
  `Pod event exporter listening on ${config.host}:${config.port}`,
);

// Run both units; the first to fail stops the process
const supervisor = new Supervisor(logger.child({ component: "supervisor" }));
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => supervisor.shutdown(`${signal} received`));
}

const outcome = await supervisor.run([
  watchUnit(watcher),
  serverUnit("exporter", app),
]);

if (outcome.status === "failed") {
  logger.fatal(
    { unit: outcome.unit, err: outcome.error },
    `Exiting: ${describeError(outcome.error)}`,
  );
  process.exit(1);
}
logger.info({ reason: outcome.reason }, "Pod event exporter stopped");
