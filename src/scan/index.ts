export { ScanService } from './service.js';
export { mapWithConcurrency } from './concurrency.js';
export { ScanRequestSchema, ResolveRequestSchema, TimelineRequestSchema } from './request.js';
export type { ScanServiceOptions, AppScanResult, FailedApp, ScanResult } from './service.js';
export type { ScanRequest, ResolveRequest, TimelineRequest } from './request.js';
