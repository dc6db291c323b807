export { isResizeResponse } from './ResizeResponse'
export type { ResizeResponse } from './ResizeResponse'
export { FIT_MODES, isFitMode, isResizeRequestBody } from './ResizeRequest'
export type { Dimensions, FitMode, ImageSource, ResizeRequest, ResizeRequestBody } from './ResizeRequest'
export type { ResizeSettings, ThresholdPolicy, NtfySettings, CostAlerterSettings } from './Settings'
export type { CostSnapshot, BillingPeriod, ServiceCost } from './CostSnapshot'
export type { ResourceCount } from './Inventory'
export type {
    ResourceKind,
    NukeAction,
    NukeOutcome,
    NukeCandidate,
    NukeRecord,
    NukeStatus,
    NukeSummary
} from './Nuke'
export type {
    CostLevel,
    CostCheckTrigger,
    NotificationKind,
    NotificationRecord,
    CostCheckResult
} from './CostCheck'
