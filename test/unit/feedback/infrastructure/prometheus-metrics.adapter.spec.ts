import { PrometheusMetricsAdapter } from '@/modules/feedback/infrastructure/adapters/metrics';

describe('PrometheusMetricsAdapter', () => {
  it('renders counters with labels', () => {
    const metrics = new PrometheusMetricsAdapter();

    metrics.incrementWebhookDelivery('message');
    metrics.incrementWebhookDelivery('message');
    metrics.incrementSignatureRejected('stale_timestamp');
    metrics.incrementSessionStarted();
    metrics.incrementFeedbackSubmitted(4);
    metrics.incrementSubmissionRejected('already_submitted');
    metrics.incrementStaleAction('rating_selected');

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toContain('feedback_webhook_deliveries_total{kind="message"} 2');
    expect(lines).toContain('feedback_signature_rejected_total{reason="stale_timestamp"} 1');
    expect(lines).toContain('feedback_sessions_started_total 1');
    expect(lines).toContain('feedback_submitted_total{rating="4"} 1');
    expect(lines).toContain('feedback_submission_rejected_total{reason="already_submitted"} 1');
    expect(lines).toContain('feedback_stale_actions_total{action="rating_selected"} 1');
  });

  it('renders the submission latency histogram', () => {
    const metrics = new PrometheusMetricsAdapter();

    metrics.observeSubmissionLatency(0.3);
    metrics.observeSubmissionLatency(-1);

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toContain('feedback_submission_latency_seconds_bucket{le="0.1"} 1');
    expect(lines).toContain('feedback_submission_latency_seconds_bucket{le="0.5"} 2');
    expect(lines).toContain('feedback_submission_latency_seconds_bucket{le="+Inf"} 2');
    expect(lines).toContain('feedback_submission_latency_seconds_sum 0.3');
    expect(lines).toContain('feedback_submission_latency_seconds_count 2');
  });

  it('lists every bucket in ascending order regardless of observation order', () => {
    const metrics = new PrometheusMetricsAdapter();

    metrics.observeSubmissionLatency(3);
    metrics.observeSubmissionLatency(0.05);

    const buckets = metrics
      .renderPrometheus()
      .split('\n')
      .filter((line) => line.startsWith('feedback_submission_latency_seconds_bucket'));

    expect(buckets).toEqual([
      'feedback_submission_latency_seconds_bucket{le="0.1"} 1',
      'feedback_submission_latency_seconds_bucket{le="0.25"} 1',
      'feedback_submission_latency_seconds_bucket{le="0.5"} 1',
      'feedback_submission_latency_seconds_bucket{le="1"} 1',
      'feedback_submission_latency_seconds_bucket{le="2"} 1',
      'feedback_submission_latency_seconds_bucket{le="5"} 2',
      'feedback_submission_latency_seconds_bucket{le="+Inf"} 2',
    ]);
  });
});
