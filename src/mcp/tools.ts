import type { Tool } from '@modelcontextprotocol/sdk/types.js';

// ── Shared input fragments ──────────────────────────────────────────────────

const cents = { type: 'integer', description: 'Amount in cents' };

const uvaSchema = {
  type: 'object',
  required: ['year', 'period', 'kz'],
  properties: {
    year:       { type: 'integer', description: 'Tax year, e.g. 2025' },
    period: {
      type: 'object',
      required: ['type', 'value'],
      properties: {
        type:  { type: 'string', enum: ['monthly', 'quarterly'] },
        value: { type: 'integer', description: '1-12 for monthly, 1-4 for quarterly' },
      },
    },
    tax_number: { type: 'string', description: 'Steuernummer' },
    kz: {
      type: 'object',
      description: 'Kennzahlen in cents: kz000, kz001, kz011, kz017 (20 %), kz018 (10 %), kz019 (13 %), kz020, kz022, kz029, kz060 (input tax), kz065, kz066, kz070, kz095',
      additionalProperties: cents,
    },
  },
};

const zmSchema = {
  type: 'object' as const,
  required: ['year', 'quarter'],
  properties: {
    year:    { type: 'integer' },
    quarter: { type: 'integer', minimum: 1, maximum: 4 },
    entries: {
      type: 'array',
      items: {
        type: 'object',
        required: ['partner_uid', 'country_code', 'delivery_type', 'amount'],
        properties: {
          partner_uid:   { type: 'string', description: 'EU VAT id of the partner, e.g. DE123456789' },
          country_code:  { type: 'string', description: 'ISO 3166-1 alpha-2, not AT' },
          delivery_type: { type: 'string', enum: ['L', 'D', 'S'], description: 'L=goods, D=triangular, S=services' },
          amount:        cents,
        },
      },
    },
    csv: { type: 'string', description: 'Alternative to entries: CSV with header partner_uid,country_code,delivery_type,amount' },
  },
};

const partySchema = {
  type: 'object',
  required: ['name', 'street', 'city', 'postal_code', 'country'],
  properties: {
    name:        { type: 'string' },
    street:      { type: 'string' },
    city:        { type: 'string' },
    postal_code: { type: 'string' },
    country:     { type: 'string', description: 'ISO 3166-1 alpha-2' },
    vat_number:  { type: 'string', description: 'UID, e.g. ATU12345678' },
    email:       { type: 'string' },
  },
};

const invoiceSchema = {
  type: 'object',
  description: 'Invoice in snake_case JSON; amounts in cents. Totals are recomputed.',
  required: ['id', 'issue_date', 'seller', 'buyer', 'lines'],
  properties: {
    id:              { type: 'string' },
    invoice_type:    { type: 'string', enum: ['380', '381', '389'], default: '380' },
    issue_date:      { type: 'string', description: 'YYYY-MM-DD' },
    due_date:        { type: 'string', description: 'YYYY-MM-DD' },
    currency:        { type: 'string', default: 'EUR' },
    buyer_reference: { type: 'string', description: 'Leitweg-ID or buyer reference' },
    seller:          partySchema,
    buyer:           partySchema,
    lines: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['id', 'description', 'quantity', 'unit_price', 'tax_category', 'tax_percent'],
        properties: {
          id:           { type: 'string' },
          description:  { type: 'string' },
          quantity:     { type: 'number' },
          unit_code:    { type: 'string', description: 'UN/ECE unit, e.g. C62, HUR', default: 'C62' },
          unit_price:   cents,
          tax_category: { type: 'string', enum: ['S', 'AA', 'Z', 'E', 'AE'] },
          tax_percent:  { type: 'number' },
        },
      },
    },
    payment_means: { type: 'string', enum: ['30', '49', '48', '10'] },
    payment_terms: { type: 'string' },
    bank_account: {
      type: 'object',
      properties: { iban: { type: 'string' }, bic: { type: 'string' }, name: { type: 'string' } },
    },
    notes: { type: 'string' },
  },
};

const sepaPartySchema = {
  type: 'object',
  required: ['name'],
  properties: { name: { type: 'string' } },
};

const sepaAccountSchema = {
  type: 'object',
  required: ['iban'],
  properties: { iban: { type: 'string' }, bic: { type: 'string' } },
};

function single(name: string, description: string): Tool['inputSchema'] {
  return {
    type: 'object',
    required: [name],
    properties: { [name]: { type: 'string', description } },
  };
}

// ── Tool list ───────────────────────────────────────────────────────────────

export const OFFLINE_TOOLS: Tool[] = [
  {
    name: 'iban_validate',
    description: 'Checks an IBAN (format, length per country, mod-97 check digits). Austrian IBANs also get the bank name and BIC.',
    inputSchema: single('iban', 'IBAN, spaces allowed'),
  },
  {
    name: 'bic_lookup',
    description: 'Finds the BIC and name of an Austrian bank by its 5-digit Bankleitzahl, or checks the format of a BIC.',
    inputSchema: {
      type: 'object',
      properties: {
        bank_code: { type: 'string', description: 'Austrian Bankleitzahl, e.g. 20111' },
        bic:       { type: 'string', description: 'BIC to check' },
      },
    },
  },
  {
    name: 'uid_validate_format',
    description: 'Checks the format of an EU VAT identification number (UID) offline. Does not query FinanzOnline.',
    inputSchema: single('uid', 'VAT id with country prefix, e.g. ATU12345678'),
  },
  {
    name: 'svnr_validate',
    description: 'Checks an Austrian social insurance number (check digit and embedded birth date).',
    inputSchema: {
      type: 'object',
      required: ['svnr'],
      properties: {
        svnr:       { type: 'string', description: '10 digits, e.g. 1237 010180' },
        birth_date: { type: 'string', description: 'Optional YYYY-MM-DD to compare with the embedded date' },
      },
    },
  },
  {
    name: 'fn_validate',
    description: 'Checks and normalizes an Austrian Firmenbuch number, e.g. "fn 123456 a" to FN123456a.',
    inputSchema: single('fn', 'Firmenbuch number'),
  },
  {
    name: 'uva_calculate',
    description: 'Computes the payable amount (KZ095) of an Austrian advance VAT return and validates it.',
    inputSchema: { type: 'object', required: ['uva'], properties: { uva: uvaSchema } },
  },
  {
    name: 'uva_generate_xml',
    description: 'Generates the FinanzOnline U30 XML of an advance VAT return. Fails if the return does not validate.',
    inputSchema: { type: 'object', required: ['uva'], properties: { uva: uvaSchema } },
  },
  {
    name: 'zm_validate',
    description: 'Validates an EU recapitulative statement (Zusammenfassende Meldung).',
    inputSchema: zmSchema,
  },
  {
    name: 'zm_generate_xml',
    description: 'Generates the XML of an EU recapitulative statement. Fails if it does not validate.',
    inputSchema: zmSchema,
  },
  {
    name: 'erechnung_calculate',
    description: 'Computes line totals, the tax breakdown per category and rate, and the payable amount of an invoice.',
    inputSchema: { type: 'object', required: ['invoice'], properties: { invoice: invoiceSchema } },
  },
  {
    name: 'erechnung_validate',
    description: 'Validates an invoice against the EN 16931 business rules used by XRechnung and ZUGFeRD.',
    inputSchema: { type: 'object', required: ['invoice'], properties: { invoice: invoiceSchema } },
  },
  {
    name: 'erechnung_generate',
    description: 'Generates an XRechnung (UBL) or ZUGFeRD (CII) XML invoice.',
    inputSchema: {
      type: 'object',
      required: ['invoice'],
      properties: {
        invoice: invoiceSchema,
        format:  { type: 'string', enum: ['xrechnung', 'zugferd'], default: 'xrechnung' },
      },
    },
  },
  {
    name: 'erechnung_parse',
    description: 'Reads an XRechnung or ZUGFeRD XML invoice and returns it as snake_case JSON.',
    inputSchema: single('xml', 'Invoice XML'),
  },
  {
    name: 'sepa_pain001_generate',
    description: 'Generates a SEPA credit transfer (pain.001.001.03). End-to-end ids are generated where missing.',
    inputSchema: {
      type: 'object',
      required: ['credit_transfer'],
      properties: {
        credit_transfer: {
          type: 'object',
          required: ['message_id', 'debtor', 'debtor_account', 'transactions'],
          properties: {
            message_id:               { type: 'string' },
            requested_execution_date: { type: 'string', description: 'YYYY-MM-DD, defaults to today' },
            debtor:                   sepaPartySchema,
            debtor_account:           sepaAccountSchema,
            transactions: {
              type: 'array',
              items: {
                type: 'object',
                required: ['amount', 'creditor', 'creditor_account'],
                properties: {
                  end_to_end_id:    { type: 'string' },
                  amount:           cents,
                  creditor:         sepaPartySchema,
                  creditor_account: sepaAccountSchema,
                  remittance_info:  { type: 'string' },
                },
              },
            },
          },
        },
      },
    },
  },
  {
    name: 'camt053_parse',
    description: 'Reads a camt.053 bank statement; with open_items the entries are reconciled against them.',
    inputSchema: {
      type: 'object',
      required: ['xml'],
      properties: {
        xml: { type: 'string', description: 'camt.053 XML' },
        open_items: {
          type: 'array',
          items: {
            type: 'object',
            required: ['id', 'amount'],
            properties: {
              id:            { type: 'string' },
              amount:        cents,
              end_to_end_id: { type: 'string' },
              reference:     { type: 'string' },
              credit_debit:  { type: 'string', enum: ['CRDT', 'DBIT'] },
            },
          },
        },
      },
    },
  },
];

export const ONLINE_TOOLS: Tool[] = [
  {
    name: 'databox_list',
    description: 'Lists the FinanzOnline databox of a stored account. Needs FO_MASTER_PASSWORD.',
    inputSchema: {
      type: 'object',
      properties: {
        account: { type: 'string', description: 'Stored account name; optional when only one exists' },
        from:    { type: 'string', description: 'YYYY-MM-DD' },
        to:      { type: 'string', description: 'YYYY-MM-DD' },
      },
    },
  },
  {
    name: 'dashboard',
    description: 'Checks the databox of every stored FinanzOnline account in parallel. Failing accounts are listed, not fatal.',
    inputSchema: {
      type: 'object',
      properties: {
        accounts: { type: 'array', items: { type: 'string' }, description: 'Account names; all when omitted' },
        services: { type: 'string', description: 'Comma-separated services, default databox' },
      },
    },
  },
];

export const TOOLS: Tool[] = [...OFFLINE_TOOLS, ...ONLINE_TOOLS];
