import { readFile } from "node:fs/promises";
import { afterEach, describe, it, expect, vi } from "vitest";
import { parseSiteConfig } from "../src/config/index.js";
import { FetchError } from "../src/errors/index.js";
import { fetchFeed, formatDisplayDate, parsePosts, slugFromLink } from "../src/feed/index.js";
import { calledUrls, stubFetch } from "./utils/fetch-stub.js";


const FEED_XML = await readFile(new URL("./fixtures/feed.xml", import.meta.url), "utf-8");


afterEach(() => {
  vi.unstubAllGlobals();
});


describe("feed parsePosts", () => {
  it("按 feed 顺序解析，去标签并解码实体", async () => {
    const posts = await parsePosts(FEED_XML);
    expect(posts).toEqual([
      {
        title: "On Rigor & Play",
        link: "https://essays.example.com/p/rigor-and-play",
        description: "Hello & welcome",
        date: "Mar 4, 2024",
        image: "",
      },
      {
        title: "Second Essay",
        link: "https://essays.example.com/p/second-essay",
        description: "Plain text summary",
        date: "",
        image: "",
      },
      {
        title: "Untimed Note",
        link: "https://essays.example.com/notes/untimed",
        description: "",
        date: "",
        image: "",
      },
    ]);
  });

  it("没有 item 时返回空数组", async () => {
    const posts = await parsePosts('<?xml version="1.0"?><rss version="2.0"><channel><title>t</title></channel></rss>');
    expect(posts).toEqual([]);
  });
});


describe("feed formatDisplayDate", () => {
  it("RFC 2822 日期按 UTC 展示", () => {
    expect(formatDisplayDate("Mon, 04 Mar 2024 12:00:00 GMT")).toBe("Mar 4, 2024");
    expect(formatDisplayDate("Tue, 31 Dec 2024 23:30:00 -0200")).toBe("Jan 1, 2025");
  });

  it("无法解析时返回空串", () => {
    expect(formatDisplayDate("")).toBe("");
    expect(formatDisplayDate("not a date")).toBe("");
  });
});


describe("feed slugFromLink", () => {
  it("取 /p/ 之后的路径段", () => {
    expect(slugFromLink("https://essays.example.com/p/my-post?utm_source=rss")).toBe("my-post");
    expect(slugFromLink("https://essays.example.com/p/my-post/comments")).toBe("my-post");
  });

  it("没有 /p/ 时返回 null", () => {
    expect(slugFromLink("https://essays.example.com/notes/untimed")).toBeNull();
  });
});


describe("feed fetchFeed", () => {
  const config = parseSiteConfig({ essays: { feedUrl: "https://essays.example.com/feed" } }).essays;

  it("带 UA 请求 feed 并解析", async () => {
    const mock = stubFetch({ "https://essays.example.com/feed": { body: FEED_XML } });
    const posts = await fetchFeed(config);
    expect(posts).toHaveLength(3);
    expect(calledUrls(mock)).toEqual(["https://essays.example.com/feed"]);
    const init = mock.mock.calls[0][1];
    expect(init?.headers).toMatchObject({ "User-Agent": config.userAgent });
  });

  it("非 2xx 抛 FetchError", async () => {
    stubFetch({ "https://essays.example.com/feed": { status: 503, body: "down" } });
    await expect(fetchFeed(config)).rejects.toBeInstanceOf(FetchError);
  });
});
