export { QrCode, encode } from "./qrcode";
export type { EncodeOptions, EncodeResult } from "./qrcode";
export { RecoveryLevel } from "./version";
export { ContentTooLongError } from "./errors";
