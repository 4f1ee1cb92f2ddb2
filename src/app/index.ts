import { main } from "./main.js";
import { devError, errorMessage } from "../shared/index.js";

void main().catch((err: unknown) => {
  devError("Failed to start:", errorMessage(err));
  process.exit(1);
});
