import { SpanStatusCode, metrics, trace, type Attributes } from "@opentelemetry/api";
import type { Logger } from "./options.js";

const otelTracer = trace.getTracer("ndlkit");

const otelMeter = metrics.getMeter("ndlkit");
const commandCounter = otelMeter.createCounter("ndlkit.mel.commands", {
  description: "Total number of MEL commands executed",
});
const commandDurationHistogram = otelMeter.createHistogram("ndlkit.mel.duration", {
  description: "MEL command duration in milliseconds",
  unit: "ms",
});
const commandErrorCounter = otelMeter.createCounter("ndlkit.mel.errors", {
  description: "Total number of failed MEL commands",
});

/** Round milliseconds to 2 decimal places */
export function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Run one MEL command inside an OpenTelemetry span, recording the command
 * counters and logging completion/failure. The command body is synchronous.
 */
export function instrumentCommand<T>(
  command: string,
  attributes: Attributes,
  logger: Logger,
  body: () => T,
): T {
  const metricAttrs = { "ndlkit.mel.command": command, ...attributes };
  return otelTracer.startActiveSpan(`ndlkit.mel.${command}`, { attributes: metricAttrs }, (span) => {
    const wallStart = performance.now();
    try {
      const result = body();
      const durationMs = roundMs(performance.now() - wallStart);
      commandCounter.add(1, metricAttrs);
      commandDurationHistogram.record(durationMs, metricAttrs);
      logger.debug("[mel] %s completed in %dms", command, durationMs);
      return result;
    } catch (err) {
      const durationMs = roundMs(performance.now() - wallStart);
      const message = err instanceof Error ? err.message : String(err);
      commandCounter.add(1, metricAttrs);
      commandDurationHistogram.record(durationMs, metricAttrs);
      commandErrorCounter.add(1, metricAttrs);
      if (err instanceof Error) span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      logger.error("[mel] %s failed: %s", command, message);
      throw err;
    } finally {
      span.end();
    }
  });
}

/** Span around one evaluation pass of a network binding. */
export function instrumentPass<T>(pass: string, model: string, body: () => T): T {
  return otelTracer.startActiveSpan(
    `ndlkit.ndl.pass.${pass}`,
    { attributes: { "ndlkit.ndl.pass": pass, "ndlkit.model": model } },
    (span) => {
      try {
        return body();
      } catch (err) {
        if (err instanceof Error) span.recordException(err);
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: err instanceof Error ? err.message : String(err),
        });
        throw err;
      } finally {
        span.end();
      }
    },
  );
}
