export { TrackingStoreLive } from "./layers.js";

export { prettyLogger, parseLogLevel, LoggerLive } from "./logging.js";
