/**
 * @fileoverview Barrel file for tagnotes type definitions.
 *
 * @module types
 */

// Base types (no dependencies)
export type { Result, AsyncResult, Logger } from './base.js';

// Version types (no dependencies)
export type { Version } from './version.js';

// Build types (depends on: version)
export type {
    ChangeCategory,
    ChangeUnitKind,
    ChangeUnit,
    IssueId,
    IssueDetails,
    ChangeItem,
    BuildInformation,
} from './build.js';

// Config types (no dependencies)
export type {
    ConnectorKind,
    GitHubConfig,
    ReportConfig,
    TagnotesConfig,
} from './config.js';
