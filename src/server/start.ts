import { startWsServer } from "./wsServer";
import { loadServerConfig } from "./config";

async function main() {
  const config = loadServerConfig();

  const server = startWsServer({
    port: config.port,
    defaultBackend: config.defaultBackend,
    maxPayloadBytes: config.maxPayloadBytes,
    log: config.logRequests ? (line) => console.log(line) : undefined,
    onError: (line, err) => console.error(line, err),
  });

  console.log(`AVF codec WS server listening on ws://localhost:${server.port}`);
  console.log(
    "Options:",
    JSON.stringify(
      {
        defaultBackend: config.defaultBackend,
        maxPayloadBytes: config.maxPayloadBytes,
        logRequests: config.logRequests,
      },
      null,
      2
    )
  );

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
