// Short code generation
export {
  generateCode,
  generateUniqueCode,
  type ExistsChecker,
} from "./shortcode.js";

// TTL helpers and clocks
export { isExpired, secondsLeft, nowSeconds, systemClock, ManualClock } from "./ttl.js";
