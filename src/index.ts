import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { getSQLClient } from "./db";
import { createKyselyStore } from "./db/store";

const config = loadConfig();
const store = createKyselyStore(getSQLClient(config));
const app = createApp({ store, config });

app.listen(config.port, () => {
  console.log(
    `Shop data service running on port ${config.port} (order totals: ${config.orderTotalPolicy})`
  );
});
