import { describe, it, expect } from "@jest/globals";
import { parseFeedQuery } from "../feed";

describe("parseFeedQuery", () => {
  it("reads actor, limit, cursor and filter", () => {
    expect(
      parseFeedQuery({
        actor: " someone.bsky.social ",
        limit: "40",
        cursor: "c1",
        filter: "posts_with_media",
      })
    ).toEqual({
      actor: "someone.bsky.social",
      limit: 40,
      cursor: "c1",
      filter: "posts_with_media",
    });
  });

  it("defaults the limit and drops unknown filters and empty cursors", () => {
    expect(parseFeedQuery({ actor: "a", limit: "lots", cursor: "", filter: "everything" })).toEqual({
      actor: "a",
      limit: 20,
    });
  });

  it("leaves a missing actor empty for the route to reject", () => {
    expect(parseFeedQuery({}).actor).toBe("");
  });
});
