#!/usr/bin/env node
import { startWsServer } from "./wsServer";
import { loadServerConfig } from "./config";

function main() {
  const config = loadServerConfig(process.env);

  const ws = startWsServer({
    port: config.port,
    defaults: config.defaults,
    persistenceDir: config.persistenceDir,
    seed: config.seed,
    log: config.quiet ? () => undefined : (line) => console.log(line),
  });

  console.log(`Minehunt WS server listening on ws://localhost:${ws.port}`);
  console.log(
    "Options:",
    JSON.stringify(
      {
        ...config.defaults,
        persistenceDir: config.persistenceDir ?? null,
        seed: config.seed ?? null,
        quiet: config.quiet,
        wsPort: ws.port,
      },
      null,
      2
    )
  );

  const shutdown = () => {
    ws.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main();
