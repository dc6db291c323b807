export {
    getEnvUploadBucket,
    getEnvResizedBucket,
    getEnvResizedWidth,
    getEnvResizedHeight,
    getEnvUrlExpiresIn,
    loadResizeSettings,
    loadCostAlerterSettings
} from './env'
export { createErrorResponse, createJobErrorResponse, createSuccessResponse } from './response'
export type { ErrorStatusCode } from './response'
export {
    JobError,
    InvalidInputError,
    StorageError,
    UpstreamUnavailableError,
    isJobError,
    errorMessage
} from './errors'
export type { ErrorKind } from './errors'
export { readObject, writeObject, createDownloadUrl } from './storage'
export { resizeImage, resolveTargetDimensions, JPEG_QUALITY } from './image'
export type { ResizedImage } from './image'
export { parseResizeRequest, decodeBase64Image, buildOutputKey, MAX_DIMENSION } from './resize-request'
export { sendNotification, createNtfyNotifier, NTFY_TIMEOUT_MS } from './ntfy'
export type { Notification, NotificationOutcome, NotificationPriority, Notifier } from './ntfy'
export { fetchCostSnapshot, monthToDatePeriod, remainingMonthPeriod } from './costs'
export {
    NUKE_TAG_KEY,
    decideNukeAction,
    isNukable,
    tagsToRecord,
    enumerateCandidates,
    applyNukeAction,
    runNukePass,
    summarizeNuke,
    finalSnapshotIdentifier
} from './nuke'
export type { NukeClients, NukeOptions } from './nuke'
export { listActiveResources } from './inventory'
export type { InventoryClients } from './inventory'
export {
    formatTopServices,
    formatInventory,
    describeTrigger,
    buildDailySummary,
    buildAlert,
    buildCriticalAlert,
    buildNukeReport
} from './messages'
export { evaluateCost, parseTrigger, runCostCheck } from './cost-check'
export type { CostCheckDeps } from './cost-check'
