import { SupabaseObjectStore, fileExtension, objectPathFromUrl } from "../services/object-store";
import { StorageError } from "../utils/errors";

const MOCK_PUBLIC_BASE = "https://project.supabase.test/storage/v1/object/public/report_photos/";

const mockUpload = jest.fn();
const mockRemove = jest.fn();

jest.mock("@supabase/supabase-js", () => ({
  createClient: jest.fn(() => ({
    storage: {
      from: () => ({
        upload: mockUpload,
        remove: mockRemove,
        getPublicUrl: (path: string) => ({ data: { publicUrl: MOCK_PUBLIC_BASE + path } }),
      }),
    },
  })),
}));

describe("object store helpers", () => {
  test("fileExtension keeps short alphanumeric extensions", () => {
    expect(fileExtension("photo.PNG")).toBe("png");
    expect(fileExtension("archive.tar.gz")).toBe("gz");
    expect(fileExtension("no-extension")).toBe("jpg");
    expect(fileExtension("weird.ex$t")).toBe("jpg");
    expect(fileExtension(undefined)).toBe("jpg");
  });

  test("objectPathFromUrl recovers the path inside the bucket", () => {
    expect(objectPathFromUrl(MOCK_PUBLIC_BASE + "lost_reports/a%20b.png?t=1", "report_photos")).toBe("lost_reports/a b.png");
    expect(objectPathFromUrl("https://elsewhere.test/a.png", "report_photos")).toBeNull();
  });
});

describe("SupabaseObjectStore", () => {
  let store: SupabaseObjectStore;

  beforeEach(() => {
    mockUpload.mockReset();
    mockRemove.mockReset();
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    store = new SupabaseObjectStore("https://project.supabase.test", "test-key", "report_photos");
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("uploads under the folder and returns the public URL", async () => {
    mockUpload.mockImplementation(async (path: string) => ({ data: { path }, error: null }));

    const url = await store.putImage({
      bytes: Buffer.from("image"),
      folder: "found_reports",
      filename: "wallet.png",
      contentType: "image/png",
    });

    const [path, bytes, options] = mockUpload.mock.calls[0];
    expect(path).toMatch(/^found_reports\/[0-9a-f-]{36}\.png$/);
    expect(bytes).toEqual(Buffer.from("image"));
    expect(options).toEqual({ contentType: "image/png", cacheControl: "3600", upsert: false });
    expect(url).toBe(MOCK_PUBLIC_BASE + path);
  });

  test("upload errors become storage errors", async () => {
    mockUpload.mockResolvedValue({ data: null, error: { message: "Bucket not found" } });

    await expect(store.putImage({ bytes: Buffer.from("image"), folder: "lost_reports" })).rejects.toThrow(
      new StorageError("Failed to upload image: Bucket not found")
    );
  });

  test("removes an image by its public URL", async () => {
    mockRemove.mockResolvedValue({ data: [], error: null });

    await store.removeImage(MOCK_PUBLIC_BASE + "lost_reports/wallet.png");

    expect(mockRemove).toHaveBeenCalledWith(["lost_reports/wallet.png"]);
  });

  test("refuses to remove URLs outside the bucket", async () => {
    await expect(store.removeImage("https://elsewhere.test/a.png")).rejects.toThrow(
      "Not an object of bucket report_photos: https://elsewhere.test/a.png"
    );
    expect(mockRemove).not.toHaveBeenCalled();
  });
});
