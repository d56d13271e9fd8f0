import { buildApp } from "./app";
import { loadEnv, loadServerConfig } from "./config";

loadEnv();

const config = loadServerConfig();
const app = buildApp(config);

async function main(): Promise<void> {
  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
