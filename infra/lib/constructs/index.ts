/**
 * Custom Constructs Index
 *
 *   import { StorageConstruct, ResizeApiConstruct } from './constructs';
 */

export { StorageConstruct } from './storage-construct';
export { ResizeApiConstruct } from './resize-api-construct';
export type { ResizeApiProps } from './resize-api-construct';
export { CostAlerterConstruct, NUKE_TAG_KEY } from './cost-alerter-construct';
export type { CostAlerterProps } from './cost-alerter-construct';
