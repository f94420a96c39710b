import { describe, it, expect, vi, beforeEach } from "vitest";
import { AvailabilityRepository } from "@src/persistence/availability.repository.js";

describe("AvailabilityRepository", () => {
  let mockRedis: { get: ReturnType<typeof vi.fn> };
  let mockLogger: { warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };
  let repo: AvailabilityRepository;

  beforeEach(() => {
    mockRedis = { get: vi.fn().mockResolvedValue(null) };
    mockLogger = { warn: vi.fn(), error: vi.fn() };
    repo = new AvailabilityRepository(mockRedis as any, mockLogger as any);
  });

  it("parses stored windows", async () => {
    mockRedis.get.mockResolvedValue(
      JSON.stringify([
        { dayOfWeek: "Monday", startTime: "09:00", endTime: "11:00" },
        { dayOfWeek: "Friday", startTime: "15:00:00", endTime: "16:30:00" },
      ]),
    );

    expect(await repo.getWindows("7")).toEqual([
      { dayOfWeek: "Monday", startTime: "09:00", endTime: "11:00" },
      { dayOfWeek: "Friday", startTime: "15:00:00", endTime: "16:30:00" },
    ]);
    expect(mockRedis.get).toHaveBeenCalledWith("directory:teacher:7:availability");
  });

  it("returns no windows when none are stored", async () => {
    expect(await repo.getWindows("7")).toEqual([]);
  });

  it("treats invalid JSON as no windows", async () => {
    mockRedis.get.mockResolvedValue("{not json");

    expect(await repo.getWindows("7")).toEqual([]);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it("treats unknown weekdays as malformed", async () => {
    mockRedis.get.mockResolvedValue(
      JSON.stringify([{ dayOfWeek: "Funday", startTime: "09:00", endTime: "11:00" }]),
    );

    expect(await repo.getWindows("7")).toEqual([]);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it("returns no windows on Redis errors", async () => {
    mockRedis.get.mockRejectedValue(new Error("Connection is closed."));

    expect(await repo.getWindows("7")).toEqual([]);
    expect(mockLogger.error).toHaveBeenCalledTimes(1);
  });
});
