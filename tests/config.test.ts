/**
 * Forum Upvote — tests/config.test.ts
 * WHAT: Tests for the ID list parser behind FORUM_CHANNEL_IDS.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { parseIdList } from "../src/config.js";

describe("parseIdList", () => {
  it("returns an empty list for unset or empty input", () => {
    expect(parseIdList(undefined)).toEqual([]);
    expect(parseIdList("")).toEqual([]);
  });

  it("splits on commas and trims", () => {
    expect(parseIdList("123, 456 ,789")).toEqual(["123", "456", "789"]);
  });

  it("drops empty entries", () => {
    expect(parseIdList("123, 456, ")).toEqual(["123", "456"]);
    expect(parseIdList(",,")).toEqual([]);
  });
});
