import { formatMinor } from '../../core/money.js';
import { calculateTotals } from '../../erechnung/calculator.js';
import { generateInvoiceXml } from '../../erechnung/generator.js';
import { invoiceToJson, parseInvoiceJson, parseInvoiceXml } from '../../erechnung/parser.js';
import type { Invoice, InvoiceFormat } from '../../erechnung/types.js';
import { validateInvoice } from '../../erechnung/validator.js';
import { UsageError, type ParsedArgs } from '../args.js';
import { emit, readText, table, validationResult, type Command } from '../context.js';

function format(args: ParsedArgs): InvoiceFormat {
  const value = args.string('format') ?? 'xrechnung';
  if (value === 'xrechnung' || value === 'zugferd') return value;
  throw new UsageError(`--format must be xrechnung or zugferd, got "${value}"`);
}

/** JSON or either XML dialect, told apart by the first non-blank character. */
async function load(args: ParsedArgs): Promise<Invoice> {
  const content = await readText(args.positional(0, 'invoice file'));
  return content.trimStart().startsWith('<') ? parseInvoiceXml(content).invoice : parseInvoiceJson(content);
}

const create: Command = async (args) => {
  const fmt = format(args);
  const invoice = await load(args);
  return emit(args, generateInvoiceXml(invoice, fmt), { id: invoice.id, format: fmt });
};

const validate: Command = async (args) => {
  const invoice = await load(args);
  return validationResult(validateInvoice(invoice));
};

const calc: Command = async (args) => {
  const invoice = calculateTotals(await load(args));
  const rows = invoice.taxSubtotals.map((s) => [
    `${s.taxCategory} ${s.taxPercent}%`,
    formatMinor(s.taxableAmount),
    formatMinor(s.taxAmount),
  ]);
  return {
    data: {
      id: invoice.id,
      currency: invoice.currency,
      tax_subtotals: invoice.taxSubtotals,
      tax_exclusive_amount: invoice.taxExclusiveAmount,
      tax_amount: invoice.taxAmount,
      tax_inclusive_amount: invoice.taxInclusiveAmount,
      payable_amount: invoice.payableAmount,
    },
    text: [
      table(['TAX', 'TAXABLE', 'AMOUNT'], rows),
      `Net:     ${formatMinor(invoice.taxExclusiveAmount)} ${invoice.currency}`,
      `Tax:     ${formatMinor(invoice.taxAmount)} ${invoice.currency}`,
      `Payable: ${formatMinor(invoice.payableAmount)} ${invoice.currency}`,
    ].join('\n'),
  };
};

const parse: Command = async (args) => {
  const { format: detected, invoice } = parseInvoiceXml(await readText(args.positional(0, 'invoice XML')));
  return emit(args, invoiceToJson(invoice), { format: detected });
};

export const erechnungCommands: Record<string, Command> = { create, validate, calc, parse };
