import { beforeEach, describe, expect, it } from "vitest";
import {
  recordHttpRequest,
  recordOtpConfirm,
  recordOtpRequest,
  recordTokensRevoked,
  renderPrometheusMetrics,
  resetMetrics,
  seriesCount,
} from "../../libs/metrics.js";

describe("Prometheus metrics", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("renders labelled OTP counters", () => {
    recordOtpRequest("sent");
    recordOtpRequest("sent");
    recordOtpRequest("cooldown");
    recordOtpConfirm(false);

    const lines = renderPrometheusMetrics().split("\n");
    expect(lines).toContain('otp_requests_total{outcome="sent"} 2');
    expect(lines).toContain('otp_requests_total{outcome="cooldown"} 1');
    expect(lines).toContain("otp_confirm_failed_total 1");
  });

  it("skips zero revocations", () => {
    recordTokensRevoked(0);
    recordTokensRevoked(3);

    const lines = renderPrometheusMetrics().split("\n");
    expect(lines).toContain("auth_tokens_revoked_total 3");
  });

  it("records request histograms per route", () => {
    recordHttpRequest("GET", "/health", 200, 0.02);

    const lines = renderPrometheusMetrics().split("\n");
    expect(lines).toContain('http_requests_total{method="GET",route="/health",status="200"} 1');
    expect(lines).toContain(
      'http_request_duration_seconds_bucket{method="GET",route="/health",le="0.025"} 1',
    );
    expect(lines).toContain(
      'http_request_duration_seconds_bucket{method="GET",route="/health",le="0.01"} 0',
    );
    expect(lines).toContain('http_request_duration_seconds_count{method="GET",route="/health"} 1');
  });

  it("announces every family with its own HELP and TYPE", () => {
    recordOtpRequest("sent");
    recordTokensRevoked(2);

    const lines = renderPrometheusMetrics().split("\n");
    const otpType = lines.indexOf("# TYPE otp_requests_total counter");
    expect(otpType).toBeGreaterThan(-1);
    expect(lines[otpType - 1]).toBe("# HELP otp_requests_total OTP issuance attempts by outcome");
    expect(lines[otpType + 1]).toBe('otp_requests_total{outcome="sent"} 1');

    const revokedType = lines.indexOf("# TYPE auth_tokens_revoked_total counter");
    expect(lines[revokedType + 1]).toBe("auth_tokens_revoked_total 2");
    expect(lines).toContain("# TYPE http_request_duration_seconds histogram");
  });

  it("keeps label values with separators intact", () => {
    recordHttpRequest("GET", "/a=b,c", 404, 0.01);
    recordHttpRequest("GET", "/a=b,c", 404, 0.01);

    const lines = renderPrometheusMetrics().split("\n");
    expect(lines).toContain('http_requests_total{method="GET",route="/a=b,c",status="404"} 2');
    expect(seriesCount("http_requests_total")).toBe(1);
  });
});
