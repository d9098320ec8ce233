/**
 * Engine exports
 */

export {
    CascadeEngine,
    CascadeExhaustedError,
    type AcceptedOutcome,
    type CascadeEngineConfig,
    type CascadeOutcome,
    type EmergencyHandler,
    type EmergencyOutcome,
} from "./CascadeEngine.js";
