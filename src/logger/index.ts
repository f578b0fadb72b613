export { log } from "@/logger/logger";
