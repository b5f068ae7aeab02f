import { Injectable } from '@nestjs/common';
import type {
  MetricsPort,
  SignatureRejectionReason,
  SubmissionRejectionReason,
  WebhookDeliveryKind,
} from '../../../application/ports/metrics.port';
import {
  FEEDBACK_METRIC_SESSIONS_STARTED_TOTAL,
  FEEDBACK_METRIC_SIGNATURE_REJECTED_TOTAL,
  FEEDBACK_METRIC_STALE_ACTIONS_TOTAL,
  FEEDBACK_METRIC_SUBMISSION_LATENCY_SECONDS,
  FEEDBACK_METRIC_SUBMISSION_REJECTED_TOTAL,
  FEEDBACK_METRIC_SUBMITTED_TOTAL,
  FEEDBACK_METRIC_WEBHOOK_DELIVERIES_TOTAL,
  FEEDBACK_SUBMISSION_LATENCY_BUCKETS,
} from '../../../../../common/metrics';

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly deliveries = new Map<string, number>();
  private readonly signatureRejections = new Map<string, number>();
  private readonly submissions = new Map<string, number>();
  private readonly submissionRejections = new Map<string, number>();
  private readonly staleActions = new Map<string, number>();
  private sessionsStarted = 0;

  private readonly latencyBuckets = new Map<string, number>(
    [...FEEDBACK_SUBMISSION_LATENCY_BUCKETS.map(String), '+Inf'].map(
      (le): [string, number] => [le, 0],
    ),
  );
  private latencySum = 0;
  private latencyCount = 0;

  incrementWebhookDelivery(kind: WebhookDeliveryKind): void {
    increment(this.deliveries, sanitizeLabelValue(kind));
  }

  incrementSignatureRejected(reason: SignatureRejectionReason): void {
    increment(this.signatureRejections, sanitizeLabelValue(reason));
  }

  incrementSessionStarted(): void {
    this.sessionsStarted += 1;
  }

  incrementFeedbackSubmitted(rating: number): void {
    increment(this.submissions, sanitizeLabelValue(String(rating)));
  }

  incrementSubmissionRejected(reason: SubmissionRejectionReason): void {
    increment(this.submissionRejections, sanitizeLabelValue(reason));
  }

  incrementStaleAction(actionType: string): void {
    increment(this.staleActions, sanitizeLabelValue(actionType));
  }

  observeSubmissionLatency(seconds: number): void {
    const latency = Number.isFinite(seconds) && seconds >= 0 ? seconds : 0;

    this.latencySum += latency;
    this.latencyCount += 1;

    for (const bucket of FEEDBACK_SUBMISSION_LATENCY_BUCKETS) {
      if (latency <= bucket) {
        increment(this.latencyBuckets, String(bucket));
      }
    }

    increment(this.latencyBuckets, '+Inf');
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${FEEDBACK_METRIC_WEBHOOK_DELIVERIES_TOTAL} Slack deliveries accepted, by kind.`);
    lines.push(`# TYPE ${FEEDBACK_METRIC_WEBHOOK_DELIVERIES_TOTAL} counter`);
    for (const [kind, value] of this.deliveries.entries()) {
      lines.push(`${FEEDBACK_METRIC_WEBHOOK_DELIVERIES_TOTAL}{kind="${kind}"} ${value}`);
    }

    lines.push(
      `# HELP ${FEEDBACK_METRIC_SIGNATURE_REJECTED_TOTAL} Requests rejected by signature verification.`,
    );
    lines.push(`# TYPE ${FEEDBACK_METRIC_SIGNATURE_REJECTED_TOTAL} counter`);
    for (const [reason, value] of this.signatureRejections.entries()) {
      lines.push(`${FEEDBACK_METRIC_SIGNATURE_REJECTED_TOTAL}{reason="${reason}"} ${value}`);
    }

    lines.push(`# HELP ${FEEDBACK_METRIC_SESSIONS_STARTED_TOTAL} Feedback prompts posted.`);
    lines.push(`# TYPE ${FEEDBACK_METRIC_SESSIONS_STARTED_TOTAL} counter`);
    lines.push(`${FEEDBACK_METRIC_SESSIONS_STARTED_TOTAL} ${this.sessionsStarted}`);

    lines.push(`# HELP ${FEEDBACK_METRIC_SUBMITTED_TOTAL} Feedback records persisted, by rating.`);
    lines.push(`# TYPE ${FEEDBACK_METRIC_SUBMITTED_TOTAL} counter`);
    for (const [rating, value] of this.submissions.entries()) {
      lines.push(`${FEEDBACK_METRIC_SUBMITTED_TOTAL}{rating="${rating}"} ${value}`);
    }

    lines.push(
      `# HELP ${FEEDBACK_METRIC_SUBMISSION_REJECTED_TOTAL} Submit attempts that did not persist a record.`,
    );
    lines.push(`# TYPE ${FEEDBACK_METRIC_SUBMISSION_REJECTED_TOTAL} counter`);
    for (const [reason, value] of this.submissionRejections.entries()) {
      lines.push(`${FEEDBACK_METRIC_SUBMISSION_REJECTED_TOTAL}{reason="${reason}"} ${value}`);
    }

    lines.push(`# HELP ${FEEDBACK_METRIC_STALE_ACTIONS_TOTAL} Form actions with no live session.`);
    lines.push(`# TYPE ${FEEDBACK_METRIC_STALE_ACTIONS_TOTAL} counter`);
    for (const [actionType, value] of this.staleActions.entries()) {
      lines.push(`${FEEDBACK_METRIC_STALE_ACTIONS_TOTAL}{action="${actionType}"} ${value}`);
    }

    lines.push(
      `# HELP ${FEEDBACK_METRIC_SUBMISSION_LATENCY_SECONDS} Time from submit click to persisted record.`,
    );
    lines.push(`# TYPE ${FEEDBACK_METRIC_SUBMISSION_LATENCY_SECONDS} histogram`);
    for (const [bucket, value] of this.latencyBuckets.entries()) {
      lines.push(`${FEEDBACK_METRIC_SUBMISSION_LATENCY_SECONDS}_bucket{le="${bucket}"} ${value}`);
    }
    lines.push(`${FEEDBACK_METRIC_SUBMISSION_LATENCY_SECONDS}_sum ${this.latencySum}`);
    lines.push(`${FEEDBACK_METRIC_SUBMISSION_LATENCY_SECONDS}_count ${this.latencyCount}`);

    return `${lines.join('\n')}\n`;
  }
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
