export { parseGuardianPayload, parseSignalPayload, type GuardianPayload, type SignalPayload } from "./schemas.js";
