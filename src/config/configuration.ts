import { validateEnv } from './env.schema';

export type GatewayConfig = {
  url: string;
  retryAttempts: number;
  retryBaseDelayMs: number;
};

export type PaymentsConfig = {
  gateway: GatewayConfig;
  bankInvoiceValidityDays: number;
};

export default () => {
  const env = validateEnv(process.env);

  const payments: PaymentsConfig = {
    gateway: {
      url: env.PAYMENT_GATEWAY_URL,
      retryAttempts: env.PAYMENT_RETRY_ATTEMPTS,
      retryBaseDelayMs: env.PAYMENT_RETRY_BASE_DELAY_MS,
    },
    bankInvoiceValidityDays: env.BANK_INVOICE_VALIDITY_DAYS,
  };

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    databaseUrl: env.DATABASE_URL,
    db: {
      sync: env.DB_SYNC,
      log: env.DB_LOG,
    },
    payments,
  };
};
