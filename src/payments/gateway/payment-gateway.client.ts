import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { GatewayConfig, PaymentsConfig } from '../../config/configuration';
import {
  executeWithRetry,
  exponentialBackoff,
  type RetryInfo,
} from '../../common/retry/retry-policy';
import { PaymentMethodCode } from '../enums/payment-method-code.enum';

export type GatewayEndpoint = PaymentMethodCode.CARD | PaymentMethodCode.TERMINAL;

export type TerminalGatewayRequest = {
  transactionAmount: number;
  accountNumber: string;
  invoiceNumber: string;
};

export type CardGatewayRequest = TerminalGatewayRequest & {
  cardHolderName: string;
  cardNumber: string;
  expirationMonth: number;
  expirationYear: number;
  cvv: number;
};

type GatewayPayloads = {
  [PaymentMethodCode.CARD]: CardGatewayRequest;
  [PaymentMethodCode.TERMINAL]: TerminalGatewayRequest;
};

export type GatewayResult = {
  approved: boolean;
  externalTransactionId: string | null;
  attempts: number;
};

type AttemptOutcome = Omit<GatewayResult, 'attempts'>;

/** The gateway could not be reached at all on the final attempt. */
export class GatewayTransportError extends Error {
  constructor(
    message: string,
    readonly attempts: number,
    readonly reason: unknown,
  ) {
    super(message);
    this.name = 'GatewayTransportError';
  }
}

function readTransactionId(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('transactionId' in data)) {
    return null;
  }
  return typeof data.transactionId === 'string' ? data.transactionId : null;
}

/**
 * POSTs one payment attempt to the external gateway, retrying declines and
 * transport faults with exponential backoff. Every retry carries the same
 * Idempotency-Key so the gateway can deduplicate.
 */
@Injectable()
export class PaymentGatewayClient {
  private readonly logger = new Logger(PaymentGatewayClient.name);
  private readonly gateway: GatewayConfig;

  constructor(config: ConfigService) {
    this.gateway = config.getOrThrow<PaymentsConfig>('payments').gateway;
  }

  async call<E extends GatewayEndpoint>(
    endpoint: E,
    payload: GatewayPayloads[E],
    idempotencyKey: string,
  ): Promise<GatewayResult> {
    const url = `${this.gateway.url.replace(/\/+$/, '')}/payments/${endpoint}`;
    const body = JSON.stringify(payload);
    let attempts = 0;

    const outcome = await executeWithRetry<AttemptOutcome>(
      (attempt) => {
        attempts = attempt;
        return this.post(url, body, idempotencyKey, attempt);
      },
      {
        maxAttempts: this.gateway.retryAttempts,
        delayMs: exponentialBackoff(this.gateway.retryBaseDelayMs),
        isSuccess: (result) => result.approved,
        isRetryableError: (err) => err instanceof GatewayTransportError,
        onRetry: (info) => this.logRetry(endpoint, idempotencyKey, info),
      },
    );

    if (!outcome.approved) {
      this.logger.warn(
        `gateway gave up endpoint=${endpoint} key=${idempotencyKey} attempts=${attempts}`,
      );
    }
    return { ...outcome, attempts };
  }

  private async post(
    url: string,
    body: string,
    idempotencyKey: string,
    attempt: number,
  ): Promise<AttemptOutcome> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Idempotency-Key': idempotencyKey,
        },
        body,
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : 'Network error';
      throw new GatewayTransportError(
        `POST ${url} failed: ${message}`,
        attempt,
        err,
      );
    }

    // drain the body on every outcome
    const text = await this.readBody(response, url);

    if (!response.ok) {
      this.logger.warn(
        `gateway declined url=${url} key=${idempotencyKey} attempt=${attempt} status=${response.status} body="${text.slice(0, 200)}"`,
      );
      return { approved: false, externalTransactionId: null };
    }

    return {
      approved: true,
      externalTransactionId: this.parseTransactionId(text, url),
    };
  }

  private async readBody(response: Response, url: string): Promise<string> {
    try {
      return await response.text();
    } catch (err: unknown) {
      this.logger.warn(
        `gateway body unreadable url=${url} status=${response.status} error=${err instanceof Error ? err.message : 'unknown'}`,
      );
      return '';
    }
  }

  // An approval with an empty, unreadable or non-JSON body is still an approval.
  private parseTransactionId(text: string, url: string): string | null {
    if (!text) return null;
    try {
      return readTransactionId(JSON.parse(text));
    } catch (err: unknown) {
      this.logger.warn(
        `gateway returned a non-JSON approval url=${url} error=${err instanceof Error ? err.message : 'unknown'}`,
      );
      return null;
    }
  }

  private logRetry(
    endpoint: GatewayEndpoint,
    idempotencyKey: string,
    info: RetryInfo,
  ): void {
    const reason =
      info.error instanceof Error ? info.error.message : 'declined';
    this.logger.warn(
      `gateway retry endpoint=${endpoint} key=${idempotencyKey} attempt=${info.attempt} delayMs=${info.delayMs} reason="${reason}"`,
    );
  }
}
