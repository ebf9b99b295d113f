/**
 * Library entry point. The CLI (`fo`) and the MCP server (`fo-mcp`) are built on these.
 */
export * from './core/errors.js';
export { loadConfig, type Config } from './core/config.js';
export { formatMinor, parseMinor, roundHalfEven, type Minor } from './core/money.js';

export * from './credentials/types.js';
export { EncryptedFileCredentialStore, MemoryCredentialStore, openCredentialStore } from './credentials/store.js';

export * from './finanzonline/types.js';
export { FinanzOnlineClient } from './finanzonline/client.js';
export { UidService, readUidCsv, writeUidResultsCsv } from './finanzonline/uid.js';

export * from './uva/types.js';
export { calculatePayable, periodLabel } from './uva/calculator.js';
export { buildUva, generateUvaXml } from './uva/generator.js';
export { parseUvaJson, parseUvaXml } from './uva/parser.js';
export { validateUva } from './uva/validator.js';
export { submitUva } from './uva/client.js';

export * from './zm/types.js';
export { buildZm, generateZmXml, totalAmount, zmPeriodLabel } from './zm/generator.js';
export { parseZmCsv, parseZmXml } from './zm/parser.js';
export { validateZm } from './zm/validator.js';
export { submitZm } from './zm/client.js';

export * from './elda/types.js';
export { EldaClient } from './elda/client.js';
export { generateAbmeldungXml, generateAnmeldungXml } from './elda/generator.js';
export { parseAbmeldungJson, parseAnmeldungJson } from './elda/parser.js';
export { validateAbmeldung, validateAnmeldung } from './elda/validator.js';

export * from './firmenbuch/types.js';
export { FirmenbuchClient } from './firmenbuch/client.js';
export { WatchlistStore } from './firmenbuch/watchlist.js';

export * from './erechnung/types.js';
export { buildInvoice, calculateTotals } from './erechnung/calculator.js';
export { generateInvoiceXml } from './erechnung/generator.js';
export { detectInvoiceFormat, invoiceToJson, parseInvoiceJson, parseInvoiceXml } from './erechnung/parser.js';
export { validateInvoice } from './erechnung/validator.js';

export * from './sepa/types.js';
export { buildCreditTransfer, generatePain001 } from './sepa/pain001.js';
export { buildDirectDebit, generatePain008 } from './sepa/pain008.js';
export { parseCamt053, totalCredits, totalDebits } from './sepa/camt053.js';
export { reconcile } from './sepa/reconcile.js';
export { validateCreditTransfer, validateDirectDebit } from './sepa/validator.js';

export { formatIban, isValidIban, validateIban } from './identifiers/iban.js';
export { isValidBic, lookupAustrianBank, normalizeBic } from './identifiers/bic.js';
export { isValidUid, validateUidFormat } from './identifiers/uid.js';
export { formatSvnr, validateSvnr } from './identifiers/svnr.js';
export { isValidFn, normalizeFn } from './identifiers/fn.js';

export { Dashboard, parseServices, summarize, type DashboardRecord, type DashboardSummary } from './dashboard/dashboard.js';
