export enum PaymentMethodCode {
  BANK = 'bank',
  TERMINAL = 'terminal',
  CARD = 'card',
}

export function parsePaymentMethodCode(
  value: string,
): PaymentMethodCode | null {
  const normalized = value.trim().toLowerCase();
  return (
    Object.values(PaymentMethodCode).find((code) => code === normalized) ??
    null
  );
}
