import { createServer } from "node:http";

import { createApp } from "./app.js";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { OperationGateway } from "./services/operationGateway.js";
import { JsonFileOrderStore } from "./services/orderStore.js";
import { SolanaBalanceOracle } from "./services/solanaBalanceOracle.js";

const bootstrap = async () => {
  const store = new JsonFileOrderStore(config.orderBookFile);
  // a corrupt or unreadable book must stop startup rather than be replaced by an empty one
  const book = await store.load();

  const oracle = new SolanaBalanceOracle({ endpoint: config.rpcEndpoint, timeoutMs: config.rpcTimeoutMs });
  const gateway = new OperationGateway({ book, store, oracle, listSort: config.orderListSort });
  const server = createServer(createApp(gateway));

  const shutdown = () => {
    logger.info("Shutting down order book service");
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, "Error while closing HTTP server");
        process.exitCode = 1;
      }
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  server.listen(config.port, () => {
    logger.info(
      { port: config.port, orderBookFile: config.orderBookFile, rpcEndpoint: config.rpcEndpoint, orders: book.size },
      "Order book service listening",
    );
  });
};

bootstrap().catch((error: unknown) => {
  logger.error({ err: error }, "Failed to start order book service");
  process.exit(1);
});
