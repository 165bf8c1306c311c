/**
 * Tests for storage.ts
 *
 * Rules download with a mocked Supabase client.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const mockDownload = vi.fn();
const mockFrom = vi.fn();
const mockWriteFile = vi.fn();
const mockCreateClient = vi.fn();

// Mock Supabase client module
vi.mock("@supabase/supabase-js", () => ({
  createClient: (...args: unknown[]) => mockCreateClient(...args),
}));

vi.mock("fs/promises", () => ({
  writeFile: (...args: unknown[]) => mockWriteFile(...args),
}));

// Import after mocking
const { SupabaseObjectStore, createStorageClient } = await import("./storage.js");
const { StorageError } = await import("./errors.js");

function fakeClient() {
  mockFrom.mockImplementation(() => ({
    download: (...args: unknown[]) => mockDownload(...args),
  }));
  mockCreateClient.mockReturnValue({ storage: { from: mockFrom } });
  return createStorageClient({
    SUPABASE_URL: "http://localhost:54321",
    SB_SECRET_KEY: "test-secret",
  });
}

describe("storage", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  describe("createStorageClient", () => {
    it("should require the project URL and secret key", () => {
      expect(() => createStorageClient({ SUPABASE_URL: "http://x" })).toThrow(
        "SUPABASE_URL and SB_SECRET_KEY are required",
      );
    });

    it("should create a session-less client", () => {
      fakeClient();

      expect(mockCreateClient).toHaveBeenCalledWith(
        "http://localhost:54321",
        "test-secret",
        { auth: { persistSession: false } },
      );
    });
  });

  describe("SupabaseObjectStore.downloadToFile", () => {
    it("should write the object bytes to the destination", async () => {
      const store = new SupabaseObjectStore(fakeClient());
      mockDownload.mockResolvedValue({
        data: new Blob(["%PDF-1.7 rules"]),
        error: null,
      });
      mockWriteFile.mockResolvedValue(undefined);

      await store.downloadToFile("rule-documents", "rules.pdf", "/tmp/rules-1.pdf");

      expect(mockFrom).toHaveBeenCalledWith("rule-documents");
      expect(mockDownload).toHaveBeenCalledWith("rules.pdf");
      const [path, buffer] = mockWriteFile.mock.calls[0];
      expect(path).toBe("/tmp/rules-1.pdf");
      expect(Buffer.isBuffer(buffer)).toBe(true);
      expect(buffer.toString()).toBe("%PDF-1.7 rules");
    });

    it("should raise StorageError when the object is missing", async () => {
      const store = new SupabaseObjectStore(fakeClient());
      mockDownload.mockResolvedValue({
        data: null,
        error: new Error("Object not found"),
      });

      const promise = store.downloadToFile("rule-documents", "rules.pdf", "/tmp/r.pdf");

      await expect(promise).rejects.toThrow(StorageError);
      await expect(promise).rejects.toThrow(
        "Failed to download rule-documents/rules.pdf: Object not found",
      );
      expect(mockWriteFile).not.toHaveBeenCalled();
    });

    it("should raise StorageError when the file cannot be written", async () => {
      const store = new SupabaseObjectStore(fakeClient());
      mockDownload.mockResolvedValue({ data: new Blob(["x"]), error: null });
      mockWriteFile.mockRejectedValue(new Error("EACCES"));

      await expect(
        store.downloadToFile("rule-documents", "rules.pdf", "/root/r.pdf"),
      ).rejects.toThrow(
        "Failed to write rule-documents/rules.pdf to /root/r.pdf: EACCES",
      );
    });
  });
});
