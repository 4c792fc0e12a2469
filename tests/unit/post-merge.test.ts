import { describe, it, expect } from "vitest";
import { mergePostRecords, mergeWithHistory } from "../../src/domain/post-merge";
import { record } from "../helpers/records";

describe("mergePostRecords", () => {
  it("should be symmetric in which record supplies a missing field", () => {
    const withText = record("a", { text: "Body", postedAt: null });
    const withDate = record("a", { text: "", postedAt: "1w" });

    expect(mergePostRecords(withText, withDate)).toMatchObject({ text: "Body", postedAt: "1w" });
    expect(mergePostRecords(withDate, withText)).toMatchObject({ text: "Body", postedAt: "1w" });
  });

  it("should keep identity fields from the earlier record", () => {
    const merged = mergePostRecords(
      record("a", { extractedAt: "2024-05-01T12:00:00.000Z" }),
      record("a", { extractedAt: "2024-05-02T12:00:00.000Z" })
    );
    expect(merged.extractedAt).toBe("2024-05-01T12:00:00.000Z");
  });
});

describe("mergeWithHistory", () => {
  it("should put current records first and append unseen history", () => {
    const history = [record("old-1"), record("shared", { text: "" }), record("old-2")];
    const current = [record("new-1"), record("shared", { text: "Now visible" })];

    const merged = mergeWithHistory(current, history);

    expect(merged.map((r) => r.postId)).toEqual(["new-1", "shared", "old-1", "old-2"]);
    expect(merged[1]?.text).toBe("Now visible");
  });

  it("should prefer the historical value for overlapping ids", () => {
    const merged = mergeWithHistory([record("a", { text: "Edited" })], [record("a", { text: "Original" })]);
    expect(merged).toEqual([record("a", { text: "Original" })]);
  });
});
