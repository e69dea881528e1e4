import { buildApp } from "./app";
import { config } from "./config";

async function start(): Promise<void> {
  const app = await buildApp();

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`backend listening on http://${config.host}:${config.port}`);
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
