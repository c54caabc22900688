import type { Logger } from 'pino';
import type { Event, PushoverParams } from '../domain/index.js';
import { fetchAttachment, sendNotification } from '../infrastructure/pushover/index.js';
import type { AgentOptions } from './agent-options.js';
import { AgentLiveness } from './liveness.js';
import { buildParameters, presence, renderFields } from './parameter-builder.js';
import type { TemplateResolver } from './template-resolver.js';
import { HandlebarsTemplateResolver } from './template-resolver.js';

export type EventOutcome = 'sent' | 'skipped';

export interface BatchSummary {
  sent: number;
  skipped: number;
  failed: number;
}

/** Rendered parameters for one event, without sending anything. */
export interface PreparedNotification {
  params: PushoverParams;
  imageUrl: string | undefined;
}

/**
 * Receives batches of events and turns each into one Pushover request.
 *
 * Events are handled one at a time, in order. A failure in one event is
 * logged and recorded for liveness; the rest of the batch still runs.
 */
export class PushoverAgent {
  constructor(
    private readonly resolver: TemplateResolver,
    private readonly log: Logger,
    readonly liveness: AgentLiveness,
  ) {}

  /** Builds an agent whose templates come from the validated options. */
  static fromOptions(options: AgentOptions, log: Logger): PushoverAgent {
    return new PushoverAgent(
      new HandlebarsTemplateResolver(options),
      log,
      new AgentLiveness(options.expected_receive_period_in_days),
    );
  }

  /** Renders and builds; null means the event would be skipped. */
  prepare(event: Event): PreparedNotification | null {
    const rendered = renderFields(this.resolver, event);
    const params = buildParameters(rendered);
    if (params === null) return null;
    return { params, imageUrl: presence(rendered.image_url) };
  }

  async receive(events: readonly Event[]): Promise<BatchSummary> {
    const summary: BatchSummary = { sent: 0, skipped: 0, failed: 0 };

    for (const event of events) {
      this.liveness.recordReceive();
      try {
        const outcome = await this.processEvent(event);
        summary[outcome]++;
      } catch (err: unknown) {
        summary.failed++;
        this.liveness.recordError();
        this.log.error({ err, event_id: event.event_id }, 'Failed to process event');
      }
    }

    this.log.debug({ ...summary, count: events.length }, 'Batch processed');
    return summary;
  }

  async processEvent(event: Event): Promise<EventOutcome> {
    const prepared = this.prepare(event);
    if (prepared === null) {
      this.log.debug({ event_id: event.event_id }, 'Required parameter blank, skipping event');
      return 'skipped';
    }

    const attachment = await fetchAttachment(prepared.imageUrl, this.log);
    const result = await sendNotification(prepared.params, attachment, this.log);

    if (result.status >= 200 && result.status < 300) {
      this.liveness.recordDispatch();
    } else {
      this.liveness.recordError();
      this.log.warn(
        { event_id: event.event_id, status: result.status },
        'Pushover API rejected notification',
      );
    }
    return 'sent';
  }

  isWorking(): boolean {
    return this.liveness.isWorking();
  }
}
