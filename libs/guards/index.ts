/**
 * Access Guards
 *
 * Guard Pipeline:
 * 1. Authentication → token verified and subject resolved to a live account
 * 2. Authorization → active account, then role
 */

export type {
    AccessRequirement,
    AccessResult,
    AccessDenyReason,
    AccessDenyDetail,
    AccessGuardDeps
} from './accessGuard.js';
export { AccessGuard, requireActive, requireRole } from './accessGuard.js';
