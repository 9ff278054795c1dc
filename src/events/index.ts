export { EventLogger } from "./logger.js";
