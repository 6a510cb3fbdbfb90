import type { Logger } from "pino";
import { roundAmount } from "../domain/sale-request.js";
import { readText } from "../domain/sale-response.js";
import type { FundOperation, FundOperationResult } from "../domain/types.js";
import type { CardGatewayPort } from "../ports/card-gateway.js";

export interface CaptureRequest {
  transactionId: string;
  amount: number;
  alreadyCaptured?: boolean;
}

export interface RefundRequest {
  transactionId: string;
  amount: number;
}

export interface CancelRequest {
  transactionId: string;
}

const SUCCESS_STATUS = {
  capture: "captured",
  refund: "refunded",
  cancel: "canceled",
} as const satisfies Record<FundOperation, FundOperationResult["status"]>;

const ERROR_STATUS = {
  capture: "capture_error",
  refund: "refund_error",
  cancel: "cancel_error",
} as const satisfies Record<FundOperation, FundOperationResult["status"]>;

export class GatewayFundOperations {
  constructor(
    private readonly gateway: CardGatewayPort,
    private readonly logger: Logger,
  ) {}

  async capture(request: CaptureRequest): Promise<FundOperationResult> {
    if (request.alreadyCaptured) {
      return { status: "captured", transactionId: request.transactionId, data: {} };
    }
    return this.run("capture", request.transactionId, request.amount);
  }

  async refund(request: RefundRequest): Promise<FundOperationResult> {
    const result = await this.run("refund", request.transactionId, request.amount);
    return result.status === "refunded" ? { ...result, refundedAmount: roundAmount(request.amount) } : result;
  }

  async cancel(request: CancelRequest): Promise<FundOperationResult> {
    return this.run("cancel", request.transactionId);
  }

  private async run(operation: FundOperation, transactionId: string, amount?: number): Promise<FundOperationResult> {
    const numericId = Number(transactionId.trim());
    if (transactionId.trim().length === 0 || !Number.isSafeInteger(numericId)) {
      return this.failed(operation, transactionId, `Transaction id '${transactionId}' is not numeric`);
    }

    const response = await this.gateway.postTransactionOperation(operation, {
      transactionID: numericId,
      ...(amount !== undefined ? { amount: roundAmount(amount) } : {}),
    });
    if (!response.ok) {
      return this.failed(operation, transactionId, response.failure.message);
    }

    const { httpStatus, body } = response.value;
    if (httpStatus >= 500) {
      return this.failed(operation, transactionId, `Gateway returned HTTP ${httpStatus}`);
    }

    const responseCode = readText(body, "responseCode", "response_code");
    const responseMessage = readText(body, "responseMessage", "response_message", "message");
    this.logger.info({ operation, transactionId, httpStatus, responseCode }, "gateway fund operation completed");
    return {
      status: SUCCESS_STATUS[operation],
      transactionId,
      data: body,
      ...(responseCode ? { responseCode } : {}),
      ...(responseMessage ? { responseMessage } : {}),
    };
  }

  private failed(operation: FundOperation, transactionId: string, error: string): FundOperationResult {
    this.logger.error({ operation, transactionId, error }, "gateway fund operation failed");
    return { status: ERROR_STATUS[operation], transactionId, data: {}, error };
  }
}
