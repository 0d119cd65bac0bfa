export { isValidEmail, extractDomain } from './validators/syntaxValidator';
export { checkRegistration, lookupRegistration, parseIsoTimestamp } from './validators/registrationValidator';
export { checkMailExchange, hasMailExchange } from './validators/dnsValidator';
export { DomainCache } from './utils/cache';
export { DomainResolver, DomainLookups, defaultLookups } from './services/domainResolutionService';
export { processEmail, validateEmails, validateEmailFile, BatchOptions } from './services/emailValidationService';
export { assertSupportedInput, readEmails, UnsupportedInputError } from './utils/emailSource';
export { ResultWriter } from './utils/resultWriter';
export * from './types/email';
