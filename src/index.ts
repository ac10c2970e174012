/**
 * broadband-scout
 *
 * Checks UK broadband offers for a postcode by driving each provider's
 * availability checker in Chromium and parsing the priced plans it shows.
 */

export * from './types/index.js';

export { SiteProfileRegistry, loadSiteProfiles, getSiteProfiles, profileFor, parseSiteProfiles } from './core/site-profiles.js';
export { extractOffers, parseCardText, dedupeOffers } from './core/offer-extractor.js';
export { NavigationDriver, type DriverLocator, type DriverPage, type DriverScope } from './core/navigation-driver.js';
export { WizardStateMachine, type WizardInput, type WizardOutcome } from './core/wizard-state-machine.js';
export { SessionRecoveryPolicy, recoveryPolicyFor, type RecoveryOutcome } from './core/session-recovery.js';
export { ScrapeSession, type PageSource, type ScrapePage, type ScrapeSessionOptions } from './core/scrape-session.js';
export { ScrapeOrchestrator, scrapeMany, type ScrapeOrchestratorOptions } from './core/scrape-orchestrator.js';
export { BrowserManager, type BatchBrowser, type BrowserConfig, type RunArtifacts } from './core/browser-manager.js';
export { RobotsGate, parseRobotsTxt, isPathAllowed, type RobotsGateOptions } from './core/robots-gate.js';
export {
  loadExisting,
  appendRows,
  splitCachedAndMissing,
  rowIdFor,
  type CacheSplit,
} from './core/offer-cache.js';
export { runOfferCheck, type CacheMode, type OfferCheckInput, type OfferCheckResult } from './core/offer-check.js';
export { parseScrapeRequest, ConfigValidationError, type ScrapeRequestInput } from './utils/config-schemas.js';
export { logger, configureLogger } from './utils/logger.js';
