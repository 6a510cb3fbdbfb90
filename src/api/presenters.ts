import type { SessionResult } from "../application/gateway-session-orchestrator.js";
import type { AuthorizationResult, FundOperationResult } from "../domain/types.js";

export interface PresentedResponse {
  statusCode: number;
  body: Record<string, unknown>;
}

export function presentSession(result: SessionResult): PresentedResponse {
  if (!result.ok) {
    return {
      statusCode: 502,
      body: {
        message: result.message,
        diagnostic: result.diagnostic,
        debug: {
          backoffice_token_obtained: result.debug.backofficeTokenObtained,
          hpf_script_found: result.debug.hostedFieldsScriptFound,
          hpp_fallback: {
            success: false,
            reason: result.debug.hostedPage.reason,
            attempts: result.debug.hostedPage.attempts,
          },
        },
      },
    };
  }

  const diagnostic = result.diagnostic ? { diagnostic: result.diagnostic } : {};
  if (result.flow === "hpp") {
    return {
      statusCode: 200,
      body: {
        ...result.context,
        flow: "hpp",
        source: result.source,
        hpp: {
          redirect_url: result.redirectUrl,
          order_url: result.orderUrl,
          client_order_id: result.clientOrderId,
        },
        payment_session_patch: {
          netvalve_flow: "hpp",
          hpp_redirect_url: result.redirectUrl,
          ...(result.clientOrderId ? { client_order_id: result.clientOrderId } : {}),
        },
        ...diagnostic,
      },
    };
  }

  const fields = result.hostedFields;
  return {
    statusCode: 200,
    body: {
      ...result.context,
      flow: "hpf",
      source: result.source,
      hpf: {
        script_src: fields.scriptSrc,
        integrity: fields.integrity,
        version: fields.version,
        payment_token: fields.paymentToken,
        jwt_token: fields.jwtToken,
        trace_id: fields.traceId,
        script_id: fields.scriptId,
      },
      payment_session_patch: {
        netvalve_flow: "hpf",
        hpf_script_src: fields.scriptSrc,
        ...(fields.integrity ? { hpf_integrity: fields.integrity } : {}),
        ...(fields.paymentToken ? { hpf_payment_token: fields.paymentToken } : {}),
        ...(fields.jwtToken ? { hpf_jwt_token: fields.jwtToken } : {}),
      },
      ...diagnostic,
    },
  };
}

export function presentAuthorization(result: AuthorizationResult): Record<string, unknown> {
  return {
    status: result.data.status,
    outcome: result.status,
    ...("path" in result ? { path: result.path } : { reason: result.reason }),
    data: result.data,
  };
}

export function presentFundOperation(result: FundOperationResult): Record<string, unknown> {
  return {
    status: result.status,
    transaction_id: result.transactionId,
    data: result.data,
    ...(result.responseCode ? { response_code: result.responseCode } : {}),
    ...(result.responseMessage ? { response_message: result.responseMessage } : {}),
    ...(result.refundedAmount !== undefined ? { refunded_amount: result.refundedAmount } : {}),
    ...(result.error ? { error: result.error } : {}),
  };
}
