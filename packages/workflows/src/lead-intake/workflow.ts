/**
 * Lead Workflow
 *
 * Runs one submission through validation, identity, duplicate check,
 * scoring, storage, scheduling and notification. Stages run strictly in
 * sequence. Validation and duplicate rejections stop the run before any
 * side effect; later step failures are recorded and the run continues.
 * processLead always resolves with a WorkflowResult.
 *
 * @module lead-intake/workflow
 */

import { getErrorMessage } from '@lead-intake/lib';
import { isFallbackScore, type ProcessedLead } from './contracts/processed-lead';
import type { Lead } from './contracts/lead-input';
import {
  WORKFLOW_MESSAGES,
  createEmptyResult,
  notificationFailedMessage,
  type WorkflowResult,
} from './contracts/workflow-result';
import { classifyError } from './error-handler';
import type { IntentScorer } from './intent-scorer';
import { createLead } from './lead';
import type { LeadStore } from './lead-store';
import { logger as defaultLogger, type LeadIntakeLogger } from './logger';
import type { Notifier } from './notifier';
import { DEFAULT_TIMEZONE, type AppointmentScheduler } from './scheduler';
import { DEFAULT_NOTIFICATION_CHANNELS, type NotificationChannel, type WorkflowStage } from './types';
import { validateLeadData } from './validator';

// ===========================================
// Dependencies
// ===========================================

export interface LeadWorkflowDependencies {
  store: LeadStore;
  scorer: Pick<IntentScorer, 'score'>;
  scheduler: Pick<AppointmentScheduler, 'createEvent'>;
  notifier: Pick<Notifier, 'notify'>;
  /** Channels notified for every lead, in order */
  channels?: readonly NotificationChannel[];
  /** Timezone for calendar events */
  timezone?: string;
  logger?: LeadIntakeLogger;
  /** Clock for lead timestamps and the past-appointment check */
  now?: () => Date;
}

// ===========================================
// Workflow
// ===========================================

export class LeadWorkflow {
  private readonly store: LeadStore;
  private readonly scorer: Pick<IntentScorer, 'score'>;
  private readonly scheduler: Pick<AppointmentScheduler, 'createEvent'>;
  private readonly notifier: Pick<Notifier, 'notify'>;
  private readonly channels: readonly NotificationChannel[];
  private readonly timezone: string;
  private readonly logger: LeadIntakeLogger;
  private readonly now: () => Date;

  constructor(deps: LeadWorkflowDependencies) {
    this.store = deps.store;
    this.scorer = deps.scorer;
    this.scheduler = deps.scheduler;
    this.notifier = deps.notifier;
    this.channels = deps.channels ?? DEFAULT_NOTIFICATION_CHANNELS;
    this.timezone = deps.timezone ?? DEFAULT_TIMEZONE;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Process one raw submission
   */
  async processLead(fields: unknown): Promise<WorkflowResult> {
    const startTime = Date.now();
    const result = createEmptyResult();
    let stage: WorkflowStage = 'received';

    try {
      // Validate
      const validation = validateLeadData(fields, { logger: this.logger, now: this.now });
      if (!validation.valid) {
        result.errors.push(...validation.errors);
        this.logger.validationFailed({ errors: validation.errors });
        return result;
      }
      stage = 'validated';

      // Identify
      const lead = createLead(validation.submission, this.now());
      result.lead_id = lead.lead_id;
      this.logger.leadReceived({ lead_id: lead.lead_id, name: lead.name, phone: lead.phone });
      stage = 'identified';

      // Duplicate check by email alone: the sheet has no lead_id column, so a
      // known email with a new phone is still a duplicate
      if (await this.store.exists(lead.email)) {
        result.errors.push(WORKFLOW_MESSAGES.DUPLICATE);
        this.logger.duplicateDetected({ lead_id: lead.lead_id });
        return result;
      }
      stage = 'dedupe_checked';

      // Score
      const processed = await this.scorer.score(lead);
      result.intent_score = processed.intent_score;
      if (isFallbackScore(processed.intent_score)) {
        result.warnings.push(WORKFLOW_MESSAGES.SCORING_FALLBACK);
      }
      stage = 'scored';

      // Store
      const stored = await this.store.append(lead, processed);
      if (!stored.success) {
        result.errors.push(WORKFLOW_MESSAGES.STORE_FAILED);
      }
      stage = 'stored';

      // Schedule
      const scheduled = await this.scheduler.createEvent(lead, processed, this.timezone);
      if (scheduled.success) {
        result.meet_link = scheduled.meetLink;
      } else {
        result.warnings.push(WORKFLOW_MESSAGES.SCHEDULE_FAILED);
      }
      stage = 'scheduled';

      // Notify
      await this.notifyAll(lead, processed, result);
      stage = 'notified';

      result.success = true;
      stage = 'done';

      this.logger.workflowCompleted({
        lead_id: lead.lead_id,
        intent_score: processed.intent_score,
        errors_count: result.errors.length,
        warnings_count: result.warnings.length,
        processing_time_ms: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      result.success = false;
      result.errors.push(WORKFLOW_MESSAGES.UNEXPECTED);

      this.logger.workflowFailed({
        lead_id: result.lead_id ?? undefined,
        stage,
        error_code: classifyError(error).code,
        error_message: getErrorMessage(error),
      });

      return result;
    }
  }

  private async notifyAll(
    lead: Lead,
    processed: ProcessedLead,
    result: WorkflowResult
  ): Promise<void> {
    for (const channel of this.channels) {
      const outcome = await this.notifier.notify(lead, processed, result.meet_link, channel);
      if (!outcome.success) {
        result.warnings.push(notificationFailedMessage(channel));
      }
    }
  }
}
