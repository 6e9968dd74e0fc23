/**
 * Honeycomb exporter example
 *
 * Traces a small checkout flow and sends the spans to Honeycomb. Without a
 * write key the spans are printed instead of sent.
 *
 * Environment variables:
 *     HONEYCOMB_WRITEKEY=...        (optional)
 *     HONEYCOMB_DATASET=checkout    (optional)
 *
 * Run:
 *     npx tsx examples/honeycomb_example.ts
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import { ConsoleHttpClient, configure, shutdown } from "../sdk/typescript/src/index.js";

configure({
  dataset: process.env.HONEYCOMB_DATASET ?? "checkout",
  // Print batches to stdout when there's nowhere to send them
  httpClient: process.env.HONEYCOMB_WRITEKEY ? undefined : new ConsoleHttpClient(),
  writeKey: process.env.HONEYCOMB_WRITEKEY ?? "example-placeholder",
  samplerateKey: "sample.rate",
  samplers: [{ type: "fixed", options: { rate: 1 } }],
  decorator: { type: "static", options: { fields: { "deploy.env": "example" } } },
  scheduledDelayMillis: 500,
});

const tracer = trace.getTracer("checkout-example");

async function chargeCard(amountCents: number): Promise<string> {
  return tracer.startActiveSpan("payment.charge", async (span) => {
    span.setAttribute("payment.amount_cents", amountCents);
    await new Promise((resolve) => setTimeout(resolve, 20));
    span.end();
    return "ch_example";
  });
}

async function checkout(cartId: string, items: number): Promise<void> {
  await tracer.startActiveSpan("checkout", async (span) => {
    span.setAttributes({ "cart.id": cartId, "cart.items": items, "sample.rate": 1 });
    try {
      const chargeId = await chargeCard(items * 1250);
      span.setAttribute("payment.charge_id", chargeId);
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) });
      throw err;
    } finally {
      span.end();
    }
  });
}

async function main(): Promise<void> {
  await checkout("cart-123", 3);
  await checkout("cart-456", 1);

  // Flush pending spans before exit
  await shutdown();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
