import { metricCount, metricMs } from "./metrics";

const mockSend = jest.fn();

jest.mock("@aws-sdk/client-cloudwatch", () => ({
    CloudWatchClient: jest.fn(() => ({ send: mockSend })),
    PutMetricDataCommand: jest.fn((input: unknown) => ({ input })),
}));

beforeEach(() => {
    mockSend.mockReset();
    delete process.env.METRICS_NS;
});

test("does nothing without a namespace", async () => {
    await metricCount("rows_read_count", 4);
    expect(mockSend).not.toHaveBeenCalled();
});

test("publishes counts and durations to the configured namespace", async () => {
    process.env.METRICS_NS = "etl.migrate";
    mockSend.mockResolvedValue({});

    await metricCount("rows_skipped_count", 2, { service: "migrate" });
    await metricMs("migrate_time_ms", 150);

    expect(mockSend.mock.calls.map(c => c[0].input)).toEqual([
        {
            Namespace: "etl.migrate",
            MetricData: [{ MetricName: "rows_skipped_count", Value: 2, Unit: "Count", Dimensions: [{ Name: "service", Value: "migrate" }] }],
        },
        {
            Namespace: "etl.migrate",
            MetricData: [{ MetricName: "migrate_time_ms", Value: 150, Unit: "Milliseconds", Dimensions: [] }],
        },
    ]);
});

test("a failed publish only warns", async () => {
    process.env.METRICS_NS = "etl.migrate";
    mockSend.mockRejectedValue(new Error("throttled"));
    const warn = jest.spyOn(console, "warn").mockImplementation(() => {});

    await expect(metricCount("documents_written_count", 10)).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith("metric-failed", "documents_written_count", "throttled");
    warn.mockRestore();
});
