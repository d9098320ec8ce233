/**
 * Resource lifecycle exports
 */

export {
    ResourceSlot,
    ResourceUnavailableError,
    type ResourceSlotOptions,
} from "./ResourceSlot.js";
export {
    ResourceHost,
    type LoadReport,
    type ManagedResource,
} from "./ResourceHost.js";
