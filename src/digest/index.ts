export { gatherDigestContent } from "./content";
export type { DigestContent } from "./content";

export {
  renderDigestHtml,
  renderDigestSubject,
  formatRunDate,
  WEATHER_UNAVAILABLE_MESSAGE,
} from "./renderer";
export type { DigestRenderInput } from "./renderer";

export { recommendClothing } from "./wardrobe";
export { describeWeatherCode } from "./conditions";

export { createSmtpSender } from "./sender";
export type { SendResult, SendDigestFn, SmtpSender } from "./sender";

export {
  dispatchDigests,
  summaryExitCode,
  EXIT_SUCCESS,
  EXIT_PARTIAL_FAILURE,
} from "./dispatcher";
export type { RunSummary, DispatchOptions } from "./dispatcher";

export { runDigestCycle } from "./orchestrator";
