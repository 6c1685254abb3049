import test from "node:test";
import assert from "node:assert/strict";
import { SpanStatusCode } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { ensureTracer, shutdownTracers, withSpan } from "../src/index";

const exporter = new InMemorySpanExporter();

ensureTracer("telemetry-test", { spanProcessor: new SimpleSpanProcessor(exporter) });

test("withSpan returns the callback result and ends the span", async () => {
  exporter.reset();

  const result = await withSpan("telemetry-test", "views.ok", (span) => {
    span.setAttribute("views.charting", 2);
    return 42;
  });

  assert.equal(result, 42);
  const spans = exporter.getFinishedSpans();
  assert.equal(spans.length, 1);
  assert.equal(spans[0].name, "views.ok");
  assert.equal(spans[0].status.code, SpanStatusCode.UNSET);
  assert.equal(spans[0].attributes["views.charting"], 2);
});

test("withSpan records the exception and rethrows it", async () => {
  exporter.reset();
  const failure = new Error("boom");

  await assert.rejects(
    withSpan("telemetry-test", "views.fail", async () => {
      throw failure;
    }),
    (error: unknown) => error === failure
  );

  const spans = exporter.getFinishedSpans();
  assert.equal(spans.length, 1);
  assert.deepEqual(spans[0].status, { code: SpanStatusCode.ERROR, message: "boom" });
  assert.equal(spans[0].events.length, 1);
  assert.equal(spans[0].events[0].name, "exception");
  assert.equal(spans[0].events[0].attributes?.["exception.message"], "boom");
});

test("withSpan rethrows non-error values unchanged", async () => {
  exporter.reset();

  await assert.rejects(
    withSpan("telemetry-test", "views.reject", () => Promise.reject("plain failure")),
    (error: unknown) => error === "plain failure"
  );

  const spans = exporter.getFinishedSpans();
  assert.equal(spans.length, 1);
  assert.deepEqual(spans[0].status, { code: SpanStatusCode.ERROR, message: "plain failure" });
});

test("ensureTracer reuses the registered provider for a known service", () => {
  const tracer = ensureTracer("telemetry-test", { consoleExport: true });
  assert.equal(typeof tracer.startSpan, "function");
});

test("shutdownTracers flushes and stops registered providers", async () => {
  exporter.reset();
  await withSpan("telemetry-test", "views.last", () => undefined);
  assert.equal(exporter.getFinishedSpans().length, 1);

  await shutdownTracers();
  assert.equal(exporter.getFinishedSpans().length, 0);
});
