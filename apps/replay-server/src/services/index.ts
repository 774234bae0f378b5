/**
 * Replay Server Services
 */

export { ReplayIndex } from "./replay-index";
export { DEFAULT_MAX_PACING_DELAY_MS, ReplayStreamController } from "./replay-stream-controller";
export { PREPARED_MESSAGE, ReplaySessionEndpoint } from "./replay-session-endpoint";
