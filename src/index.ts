import { config } from "dotenv";
import { join } from "path";
import { getHomeDir } from "@/home";

config({ path: join(getHomeDir(), ".env") });

await import("@/cli");
