import type { FastifyBaseLogger } from "fastify";
import type { AlertEvent } from "../types/alert.js";
import { getServiceConfig } from "./config.js";
import { buildPayload } from "./translator.js";
import { saveForRetry } from "../store/retry.js";
import { DisabledError, ProtocolError, TransportError } from "../errors.js";
import { inc } from "../metrics.js";

/**
 * Deliver one event to an AlertManager endpoint.
 *
 * - Disabled service: rejects with DisabledError before any I/O.
 * - No response (refused, DNS, reset): the request body is staged in
 *   `retryFolder` and the TransportError is rejected with. A failed write is
 *   logged only; it never replaces the transport error.
 * - Any status but 200: rejects with ProtocolError. Nothing is staged, since
 *   the endpoint did receive the request.
 */
export async function dispatchAlert(
  url: string,
  retryFolder: string,
  event: AlertEvent,
  log: FastifyBaseLogger
): Promise<void> {
  const config = getServiceConfig();
  if (!config.enabled) {
    throw new DisabledError();
  }

  const body = buildPayload(event);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });
  } catch (err) {
    inc("transport_errors_total");
    const transportErr = new TransportError(url, err);
    log.warn({ component: "dispatcher", event: "transport_failed", url, alertId: event.state.id, err: transportErr }, "alert_transport_failed");
    await stageForRetry(retryFolder, body, event, log);
    throw transportErr;
  }

  await response.body?.cancel();
  if (response.status !== 200) {
    inc("protocol_errors_total");
    throw new ProtocolError(response.status);
  }
  inc("alerts_sent_total");
  log.debug({ component: "dispatcher", event: "alert_sent", url, alertId: event.state.id }, "alert_sent");
}

async function stageForRetry(retryFolder: string, body: string, event: AlertEvent, log: FastifyBaseLogger): Promise<void> {
  try {
    const path = await saveForRetry(retryFolder, body);
    inc("retry_files_written_total");
    log.info({ component: "dispatcher", event: "retry_saved", alertId: event.state.id, path }, "alert_saved_for_retry");
  } catch (err) {
    inc("retry_write_errors_total");
    log.error({ component: "dispatcher", event: "retry_save_failed", alertId: event.state.id, retryFolder, err }, "retry_save_failed");
  }
}
