export { BLUETOOTH_UUID_BASE, normalizeServiceUuid, toFullUuid } from "./uuid";
