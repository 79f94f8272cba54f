import { AppConfig } from "../config/env";
import { ShopStore } from "./store";

export interface AppDeps {
  store: ShopStore;
  config: Pick<AppConfig, "orderTotalPolicy" | "bcryptRounds">;
}
