import { describe, expect, it, vi } from "vitest";
import { UploadError } from "./errors";
import { normalizePairPayload } from "./normalize";
import type { RateRecord } from "./types";
import { uploadRecords, type RateDestination, type WriteOptions } from "./uploader";

const fakeDestination = () => {
  const destination = {
    id: "dune" as const,
    prepare: vi.fn(async () => undefined),
    write: vi.fn(async (records: RateRecord[], _options: WriteOptions) => records.length),
  };
  const typed: RateDestination = destination;
  return { destination, typed };
};

const eur: RateRecord = {
  date: "2024-01-01",
  base_currency: "USD",
  quote_currency: "EUR",
  rate: "0.920000000",
  source: "providerX",
};

describe("uploadRecords", () => {
  it("uploads a normalized pair payload and reports one success", async () => {
    const { destination, typed } = fakeDestination();
    const { records } = normalizePairPayload({ USD_EUR: 0.92, date: "2024-01-01" }, "providerX");

    const result = await uploadRecords(records, typed);

    expect(result).toEqual({ succeeded: 1, failed: 0 });
    expect(destination.write).toHaveBeenCalledWith([eur], { replace: false });
  });

  it("drops duplicate keys and counts them as failures", async () => {
    const { destination, typed } = fakeDestination();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const result = await uploadRecords([eur, { ...eur, rate: "0.930000000" }], typed);

    expect(result).toEqual({ succeeded: 1, failed: 1 });
    expect(destination.write).toHaveBeenCalledWith([eur], { replace: false });
    expect(console.warn).toHaveBeenCalledWith(
      JSON.stringify({ domain: "upload", action: "duplicate", key: "2024-01-01|USD|EUR|providerX" }),
    );
  });

  it("sends nothing for an empty batch", async () => {
    const { destination, typed } = fakeDestination();

    await expect(uploadRecords([], typed)).resolves.toEqual({ succeeded: 0, failed: 0 });
    expect(destination.prepare).not.toHaveBeenCalled();
    expect(destination.write).not.toHaveBeenCalled();
  });

  it("prepares the table and passes replace mode to the write", async () => {
    const { destination, typed } = fakeDestination();

    await uploadRecords([eur], typed, { replace: true });

    const [prepareOrder] = destination.prepare.mock.invocationCallOrder;
    const [writeOrder] = destination.write.mock.invocationCallOrder;
    expect(prepareOrder).toBeLessThan(writeOrder);
    expect(destination.write).toHaveBeenCalledWith([eur], { replace: true });
  });

  it("counts records the destination did not write as failed", async () => {
    const { destination, typed } = fakeDestination();
    destination.write.mockResolvedValue(0);

    await expect(uploadRecords([eur], typed)).resolves.toEqual({ succeeded: 0, failed: 1 });
  });

  it("propagates a rejected batch", async () => {
    const { destination, typed } = fakeDestination();
    destination.write.mockRejectedValue(new UploadError("dune", "insert failed: 400 bad csv", 400));

    await expect(uploadRecords([eur], typed)).rejects.toThrow("dune: insert failed: 400 bad csv");
  });
});
