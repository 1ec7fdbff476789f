/**
 * Tracing and Log Context Unit Tests
 *
 * Tests span helpers and the log fields set around replication passes.
 */

const mockSpan = {
  setAttribute: jest.fn(),
  setStatus: jest.fn(),
  end: jest.fn(),
};

const mockTracer = {
  startActiveSpan: jest.fn((_name: string, fn: (span: typeof mockSpan) => Promise<unknown>) => fn(mockSpan)),
};

jest.mock('@opentelemetry/api', () => ({
  trace: { getTracer: jest.fn(() => mockTracer) },
  SpanStatusCode: {
    OK: 1,
    ERROR: 2,
  },
}));

const mockSDKInstance = {
  start: jest.fn(),
  shutdown: jest.fn().mockResolvedValue(undefined),
};

jest.mock('@opentelemetry/sdk-node', () => ({
  NodeSDK: jest.fn(() => mockSDKInstance),
}));

jest.mock('@opentelemetry/exporter-trace-otlp-http', () => ({
  OTLPTraceExporter: jest.fn(),
}));

jest.mock('@opentelemetry/auto-instrumentations-node', () => ({
  getNodeAutoInstrumentations: jest.fn(() => []),
}));

const mockLogger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

jest.mock('../../../src/observability/logger', () => ({
  logger: mockLogger,
}));

let mockOtelEnabled = false;

jest.mock('../../../src/config', () => ({
  config: {
    isTest: false,
    get otel() {
      return { enabled: mockOtelEnabled, exporterEndpoint: 'http://collector:4318/v1/traces' };
    },
  },
}));

type TracingModule = typeof import('../../../src/observability/tracing');
type LogContextModule = typeof import('../../../src/observability/log-context');

describe('Tracing Module', () => {
  let tracing: TracingModule;
  let logContext: LogContextModule;

  beforeEach(async () => {
    mockOtelEnabled = false;
    jest.resetModules();

    tracing = await import('../../../src/observability/tracing');
    logContext = await import('../../../src/observability/log-context');
  });

  describe('initTracing', () => {
    it('should skip the SDK when telemetry is disabled', () => {
      tracing.initTracing('finance-transactions');

      expect(mockLogger.debug).toHaveBeenCalledWith({ serviceName: 'finance-transactions' }, 'Tracing disabled');
      expect(mockSDKInstance.start).not.toHaveBeenCalled();
    });

    it('should start the SDK and shut it down once', async () => {
      mockOtelEnabled = true;

      tracing.initTracing('finance-catalog');
      await tracing.shutdownTracing();
      await tracing.shutdownTracing();

      expect(mockSDKInstance.start).toHaveBeenCalledTimes(1);
      expect(mockLogger.info).toHaveBeenCalledWith(
        { endpoint: 'http://collector:4318/v1/traces', serviceName: 'finance-catalog' },
        'OpenTelemetry tracing initialized'
      );
      expect(mockSDKInstance.shutdown).toHaveBeenCalledTimes(1);
    });
  });

  describe('withSpan', () => {
    it('should set attributes and end the span on success', async () => {
      const result = await tracing.withSpan('catalog.fetch', { 'catalog.resource': 'currency' }, async () => 42);

      expect(result).toBe(42);
      expect(mockSpan.setAttribute).toHaveBeenCalledWith('catalog.resource', 'currency');
      expect(mockSpan.setStatus).toHaveBeenCalledWith({ code: 1 });
      expect(mockSpan.end).toHaveBeenCalledTimes(1);
    });

    it('should record the error message and rethrow', async () => {
      await expect(
        tracing.withSpan('catalog.fetch', {}, async () => {
          throw new Error('catalog down');
        })
      ).rejects.toThrow('catalog down');

      expect(mockSpan.setStatus).toHaveBeenCalledWith({ code: 2, message: 'catalog down' });
      expect(mockSpan.end).toHaveBeenCalledTimes(1);
    });
  });

  describe('traceReplication', () => {
    it('should name the span after the kind and add the kind to the log context', async () => {
      const context = await logContext.runWithContext({ correlationId: 'replication-7', jobId: '7' }, () =>
        tracing.traceReplication('currencies', async () => logContext.getLogContext())
      );

      expect(mockTracer.startActiveSpan).toHaveBeenCalledWith('replication.currencies', expect.any(Function));
      expect(mockSpan.setAttribute).toHaveBeenCalledWith('replication.kind', 'currencies');
      expect(context).toEqual({ correlationId: 'replication-7', jobId: '7', replicationKind: 'currencies' });
    });

    it('should leave the surrounding context untouched', async () => {
      const after = await logContext.runWithContext({ correlationId: 'request-1' }, async () => {
        await tracing.traceReplication('holders', async () => undefined);
        return logContext.getLogContext();
      });

      expect(after).toEqual({ correlationId: 'request-1' });
    });
  });

  describe('withLogFields', () => {
    it('should make a correlation id outside any request or job', () => {
      const context = logContext.withLogFields({ replicationKind: 'accounts' }, () => logContext.getLogContext());

      expect(context?.correlationId).toMatch(/^[0-9a-f-]{36}$/);
      expect(context?.replicationKind).toBe('accounts');
      expect(context?.jobId).toBeUndefined();
    });
  });
});
