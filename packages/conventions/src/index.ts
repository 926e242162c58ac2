/**
 * @waypost/conventions - Branch, commit and PR title rules
 */

export {
  ConventionError,
  isInvalidFormat,
  unwrap,
  type ConventionRule,
  type ValidationResult,
} from './errors.js';
export {
  parseTicket,
  extractTicketReference,
  extractTicketReferences,
  type TicketExtractionOptions,
} from './ticket.js';
export { validateBranchName, buildBranchName, slugify, type BranchNameParts } from './branch.js';
export { validateCommitSubject, validateCommitMessage } from './commit.js';
export { buildPRTitle, validatePRTitle } from './pr-title.js';
