export {
  type HidHandle,
  type LightDevice,
  LUXAFOR_PRODUCT_ID,
  LUXAFOR_VENDOR_ID,
  LuxaforDevice,
  staticReport,
  strobeReport,
} from "./device.ts";
export {
  StatusLight,
  type StatusLightOptions,
  type UpdateResult,
} from "./daemon.ts";
export {
  loadStatusLightEnv,
  type StatusLightEnv,
  StatusLightEnvSchema,
} from "./env.ts";
export {
  chooseSignal,
  COLORS,
  type LightSignal,
  type Rgb,
  STROBE_REPEAT,
  STROBE_SPEED,
} from "./signal.ts";
export {
  type CountOptions,
  countTicketStates,
  type TicketStates,
} from "./states.ts";
