import { describe, it, expect } from "vitest";
import { parseProfileReference } from "../../src/domain/profile-reference";
import { ConfigError } from "../../src/core/errors";

describe("parseProfileReference", () => {
  const expected = {
    handle: "jane-doe",
    profileUrl: "https://www.linkedin.com/in/jane-doe/",
    activityUrl: "https://www.linkedin.com/in/jane-doe/recent-activity/all/",
  };

  it.each([
    "jane-doe",
    "@jane-doe",
    "  Jane-Doe  ",
    "https://www.linkedin.com/in/jane-doe/",
    "https://linkedin.com/in/jane-doe",
    "www.linkedin.com/in/Jane-Doe/recent-activity/all/?trk=x",
    "https://uk.linkedin.com/in/jane-doe/details/experience/",
  ])("should normalize %s", (input) => {
    expect(parseProfileReference(input)).toEqual(expected);
  });

  it("should decode percent-encoded handles and re-encode them in URLs", () => {
    const profile = parseProfileReference("https://www.linkedin.com/in/jos%C3%A9-garc%C3%ADa/");
    expect(profile.handle).toBe("josé-garcía");
    expect(profile.profileUrl).toBe("https://www.linkedin.com/in/jos%C3%A9-garc%C3%ADa/");
  });

  it.each([
    "",
    "   ",
    "https://example.com/in/jane-doe",
    "https://www.linkedin.com/company/acme-corp/",
    "jane doe",
    "a",
    "-leading-dash",
  ])("should reject %j", (input) => {
    expect(() => parseProfileReference(input)).toThrow(ConfigError);
  });
});
