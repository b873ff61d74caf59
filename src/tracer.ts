import { context, type Span, trace } from '@opentelemetry/api';
import apm from 'elastic-apm-node';
import { toError } from './error.list.js';
import { logger } from './log.js';
import { getVersion } from './version.js';

const ServiceName = 'artifact-provision';

type ApmAgent = ReturnType<typeof apm.start>;

export const ot = { trace, context };

class TraceControl {
  agent?: ApmAgent;
  tracer = ot.trace.getTracer(ServiceName, getVersion().version ?? 'unknown');
  rootSpan?: Span;
  isStarted = false;

  private setup(): void {
    if (process.env['TELEMETRY_DISABLED'] != null) return logger.debug('$TELEMETRY_DISABLED is set, skipping trace');
    const serverUrl = process.env['PROVISION_APM_SERVER_URL'];
    if (serverUrl == null) return logger.debug('$PROVISION_APM_SERVER_URL is empty, skipping trace');

    this.agent = apm.start({
      serviceName: ServiceName,
      serviceVersion: getVersion().version ?? 'unknown',
      serverUrl,
      secretToken: process.env['PROVISION_APM_SECRET_TOKEN'],
      opentelemetryBridgeEnabled: true,
    });

    process.on('SIGINT', async () => {
      logger.info('Ctrl+C Shutting down');
      if (this.rootSpan) {
        this.rootSpan.setAttribute('interrupted', true);
        this.rootSpan.end();
      }
      await this.shutdown();
      process.exit(130);
    });
    this.isStarted = true;
    logger.debug('Telemetry:Setup:Done');
  }

  /** Start a root span that traces */
  startRootSpan<T>(name: string, cb: (s: Span) => Promise<T>): Promise<T> {
    if (this.rootSpan) throw new Error('Duplicate root span');
    logger.info({ command: { package: ServiceName, cmd: name, ...getVersion() } }, 'Command:Start');

    return this.tracer.startActiveSpan(name, async (span) => {
      this.rootSpan = span;
      try {
        return await cb(span);
      } finally {
        span.end();
      }
    });
  }

  /** Start a span off from the top level span if it exists */
  startSpan(name: string): Span {
    if (this.rootSpan == null) return this.tracer.startSpan(name);
    return this.tracer.startSpan(name, undefined, ot.trace.setSpan(ot.context.active(), this.rootSpan));
  }

  _shutdown: Promise<void> | null = null;
  private shutdown(): Promise<void> {
    if (this._shutdown == null) {
      this._shutdown = (async (): Promise<void> => {
        if (this.agent != null) {
          await new Promise((r) => this.agent?.flush(r));
          this.agent.destroy();
        }
      })();
    }
    return this._shutdown;
  }

  /** Run a command, any error is logged and sets a failing exit code */
  async run(cb: () => Promise<unknown>): Promise<void> {
    this.setup();
    try {
      await cb();
    } catch (e) {
      if (this.rootSpan) this.rootSpan.recordException(toError(e));
      logger.fatal({ err: e }, 'Command:Failed');
      process.exitCode = 1;
    } finally {
      logger.trace('Telemetry:Sync');
      await this.shutdown();
      logger.debug('Telemetry:Sync:Done');
    }
  }
}

export const Tracer = new TraceControl();
