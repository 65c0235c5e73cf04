import "dotenv/config";
import { pino } from "pino";
import { loadConfig } from "./config.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const app = await createServer(config);
  await app.listen({ host: config.HOST, port: config.PORT });
}

main().catch((err: unknown) => {
  pino().fatal({ err }, "server failed to start");
  process.exit(1);
});
