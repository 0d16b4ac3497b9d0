import { startEngineServer } from "./app.ts";

const port = Number(process.env.PORT ?? 8789);

startEngineServer({ port })
  .then(({ url, gamesDir }) => {
    // eslint-disable-next-line no-console
    console.log(`[quadchess-server] listening on ${url}`);
    // eslint-disable-next-line no-console
    console.log(`[quadchess-server] persistence dir: ${gamesDir ?? "(disabled)"}`);
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("[quadchess-server] failed to start", err);
    process.exitCode = 1;
  });
