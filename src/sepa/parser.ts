import { z } from 'zod';
import { parseJson, parseWithSchema } from '../core/schema.js';
import { buildCreditTransfer } from './pain001.js';
import { buildDirectDebit } from './pain008.js';
import type { CreditTransfer, DirectDebit, OpenItem, SepaAccount, SepaParty } from './types.js';

// snake_case JSON, amounts in cents.

const cents = z.number().int();
const date = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const partySchema = z.object({
  name: z.string(),
  id: z.string().optional(),
  address: z.object({
    street_name: z.string().optional(),
    building_number: z.string().optional(),
    post_code: z.string().optional(),
    town_name: z.string().optional(),
    country: z.string(),
  }).optional(),
});

const accountSchema = z.object({
  iban: z.string(),
  bic: z.string().optional(),
  name: z.string().optional(),
  currency: z.string().optional(),
});

type PartyJson = z.infer<typeof partySchema>;
type AccountJson = z.infer<typeof accountSchema>;

function party(p: PartyJson): SepaParty {
  return {
    name: p.name,
    id: p.id,
    address: p.address && {
      streetName: p.address.street_name,
      buildingNumber: p.address.building_number,
      postCode: p.address.post_code,
      townName: p.address.town_name,
      country: p.address.country,
    },
  };
}

function account(a: AccountJson): SepaAccount {
  return { iban: a.iban, bic: a.bic, name: a.name, currency: a.currency };
}

const creditTransferSchema = z.object({
  message_id: z.string(),
  creation_time: z.string().optional(),
  requested_execution_date: date.optional(),
  initiating_party: partySchema.optional(),
  debtor: partySchema,
  debtor_account: accountSchema,
  transactions: z.array(z.object({
    instruction_id: z.string().optional(),
    end_to_end_id: z.string().optional(),
    amount: cents,
    currency: z.string().optional(),
    creditor: partySchema,
    creditor_account: accountSchema,
    remittance_info: z.string().optional(),
  })),
});

export function parseCreditTransferJson(content: string, now = new Date()): CreditTransfer {
  const raw = parseWithSchema(creditTransferSchema, parseJson(content, 'credit transfer JSON'));
  return buildCreditTransfer({
    messageId: raw.message_id,
    creationTime: raw.creation_time,
    requestedExecutionDate: raw.requested_execution_date,
    initiatingParty: raw.initiating_party && party(raw.initiating_party),
    debtor: party(raw.debtor),
    debtorAccount: account(raw.debtor_account),
    transactions: raw.transactions.map((tx) => ({
      instructionId: tx.instruction_id,
      endToEndId: tx.end_to_end_id,
      amount: tx.amount,
      currency: tx.currency,
      creditor: party(tx.creditor),
      creditorAccount: account(tx.creditor_account),
      remittanceInfo: tx.remittance_info,
    })),
  }, now);
}

const directDebitSchema = z.object({
  message_id: z.string(),
  creation_time: z.string().optional(),
  requested_collection_date: date.optional(),
  creditor: partySchema,
  creditor_account: accountSchema,
  creditor_id: z.string(),
  transactions: z.array(z.object({
    instruction_id: z.string().optional(),
    end_to_end_id: z.string().optional(),
    amount: cents,
    currency: z.string().optional(),
    debtor: partySchema,
    debtor_account: accountSchema,
    mandate_id: z.string(),
    mandate_date: date,
    sequence_type: z.enum(['FRST', 'RCUR', 'FNAL', 'OOFF']).default('RCUR'),
    remittance_info: z.string().optional(),
  })),
});

export function parseDirectDebitJson(content: string, now = new Date()): DirectDebit {
  const raw = parseWithSchema(directDebitSchema, parseJson(content, 'direct debit JSON'));
  return buildDirectDebit({
    messageId: raw.message_id,
    creationTime: raw.creation_time,
    requestedCollectionDate: raw.requested_collection_date,
    creditor: party(raw.creditor),
    creditorAccount: account(raw.creditor_account),
    creditorId: raw.creditor_id,
    transactions: raw.transactions.map((tx) => ({
      instructionId: tx.instruction_id,
      endToEndId: tx.end_to_end_id,
      amount: tx.amount,
      currency: tx.currency,
      debtor: party(tx.debtor),
      debtorAccount: account(tx.debtor_account),
      mandateId: tx.mandate_id,
      mandateDate: tx.mandate_date,
      sequenceType: tx.sequence_type,
      remittanceInfo: tx.remittance_info,
    })),
  }, now);
}

const openItemsSchema = z.array(z.object({
  id: z.string(),
  amount: cents,
  end_to_end_id: z.string().optional(),
  reference: z.string().optional(),
  credit_debit: z.enum(['CRDT', 'DBIT']).optional(),
}));

export function parseOpenItemsJson(content: string): OpenItem[] {
  return parseWithSchema(openItemsSchema, parseJson(content, 'open items JSON')).map((it) => ({
    id: it.id,
    amount: it.amount,
    endToEndId: it.end_to_end_id,
    reference: it.reference,
    creditDebit: it.credit_debit,
  }));
}
