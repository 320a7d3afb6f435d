import "dotenv/config";
import { config } from "./config";
import { createApp } from "./app";
import { createCapabilities, createServices } from "./bootstrap";
import { validateDeploymentPaths } from "./lib/paths";
import { createLogger } from "./lib/logger";

const log = createLogger("orchestrator");

const paths = validateDeploymentPaths({
  repoRoot: config.repoRoot,
  chartPath: config.chartPath,
  valuesLocal: config.valuesLocal,
  valuesProd: config.valuesProd
});

const services = createServices(config, createCapabilities(config));

const app = createApp({
  stores: services.stores,
  audit: services.audit,
  metrics: services.metrics,
  corsOrigin: config.corsOrigin,
  rateLimit: { windowMinutes: config.rateLimitWindowMinutes, max: config.rateLimitMax },
  maxDetailLength: config.maxDetailLength,
  info: {
    repo_root: paths.repoRoot,
    chart_path: paths.chartPath,
    values_local: paths.valuesLocal,
    values_prod: paths.valuesProd
  }
});

log.info("Starting orchestrator");
log.info(`  Repository Root:    ${paths.repoRoot}`);
log.info(`  Chart Path:         ${paths.chartPath}`);
log.info(`  Values (local):     ${paths.valuesLocal}`);
log.info(`  Values (prod):      ${paths.valuesProd}`);
log.info(`  Cluster backend:    ${config.clusterBackend} (conflict check ${config.conflictCheckPolicy})`);

app.listen(config.port, () => {
  log.info(`Backend listening on port ${config.port}`);
});
