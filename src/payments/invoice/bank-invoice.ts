import { DateTime } from 'luxon';

export type BankInvoiceInput = {
  customerId: string;
  orderId: string;
  amount: number;
  createdAt: Date;
  validUntil: Date;
};

function formatUtc(date: Date): string {
  return `${DateTime.fromJSDate(date, { zone: 'utc' }).toFormat('yyyy-MM-dd HH:mm:ss')} UTC`;
}

export function bankInvoiceFileName(orderId: string): string {
  return `invoice_${orderId}.txt`;
}

/** `createdAt` plus `days` whole days, in UTC. */
export function invoiceValidUntil(createdAt: Date, days: number): Date {
  return DateTime.fromJSDate(createdAt, { zone: 'utc' }).plus({ days }).toJSDate();
}

/**
 * Bank-transfer invoice as UTF-8 text. Depends only on its input: the same
 * input always yields the same bytes.
 */
export function generateBankInvoice(input: BankInvoiceInput): Buffer {
  const lines = [
    'BANK PAYMENT INVOICE',
    '====================',
    '',
    `Customer ID: ${input.customerId}`,
    `Order ID: ${input.orderId}`,
    `Created: ${formatUtc(input.createdAt)}`,
    `Valid Until: ${formatUtc(input.validUntil)}`,
    `Amount: ${input.amount.toFixed(2)}`,
    '',
    'Please use this invoice to complete your bank transfer.',
    'This invoice is valid until the date above.',
  ];
  return Buffer.from(`${lines.join('\n')}\n`, 'utf8');
}
