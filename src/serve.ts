import { isDevMode, loadConfigFromDisk, validateStartupConfig } from "./config.js";
import { createEnvironment } from "./environments/registry.js";
import { buildGateway } from "./gateway.js";

async function main(): Promise<void> {
  const config = loadConfigFromDisk({ cwd: process.cwd() });
  const devMode = isDevMode();
  validateStartupConfig(config, {
    allowInsecureDefaults: devMode
  });

  const environment = createEnvironment(config);
  await environment.start();
  const gateway = buildGateway({ config, environment });

  const port = Number.parseInt(process.env.PORT ?? String(config.gateway.port), 10);
  const host = config.gateway.bind === "loopback" ? "127.0.0.1" : "0.0.0.0";
  await gateway.listen({ host, port });
  console.warn(
    `[runbox] gateway listening on ${host}:${port} (backend=${environment.kind}, language=${environment.language}${
      devMode ? ", dev mode" : ""
    })`
  );

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    await gateway.close();
    await environment.close();
    process.exit(0);
  };
  process.once("SIGINT", () => {
    void shutdown();
  });
  process.once("SIGTERM", () => {
    void shutdown();
  });
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
