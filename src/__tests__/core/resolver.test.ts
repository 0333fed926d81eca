import { ImageResolver } from "../../core/resolver";
import logger from "../../lib/logger";
import { Fallible, PageSource, SynonymSource } from "../../types";

function categoryPage(...sources: string[]): Fallible<string> {
  const images = sources.map((src) => `<img src="${src}">`).join("");
  return { ok: true, value: `<html><body>${images}</body></html>` };
}

class FakePageSource implements PageSource {
  readonly requested: string[] = [];

  constructor(private readonly pages: Map<string, Fallible<string>>) {}

  async fetch(word: string): Promise<Fallible<string>> {
    this.requested.push(word);
    return this.pages.get(word) ?? categoryPage();
  }
}

class FakeSynonymSource implements SynonymSource {
  readonly requested: string[] = [];

  constructor(private readonly result: Fallible<string[]>) {}

  async lookup(word: string): Promise<Fallible<string[]>> {
    this.requested.push(word);
    return this.result;
  }
}

const CAR_THUMBS = [
  "https://upload.example.org/commons/thumb/1/1a/Red_car.jpg/220px-Red_car.jpg",
  "https://upload.example.org/commons/thumb/2/2b/Blue_car.png/220px-Blue_car.png",
];
const CAR_IMAGES = [
  "https://upload.example.org/commons/1/1a/Red_car.jpg",
  "https://upload.example.org/commons/2/2b/Blue_car.png",
];

describe("[Core] Resolver", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("should resolve from the word's own category page", async () => {
    const pages = new FakePageSource(new Map([["car", categoryPage(...CAR_THUMBS)]]));
    const synonyms = new FakeSynonymSource({ ok: true, value: ["automobile"] });
    const resolver = new ImageResolver(pages, synonyms, () => 0);

    const resolution = await resolver.resolve("car");

    expect(resolution).toEqual({
      state: "Resolved",
      word: "car",
      candidates: CAR_IMAGES,
      imageUrl: CAR_IMAGES[0],
      attempts: ["car"],
    });
    expect(synonyms.requested).toEqual([]);
  });

  test("should fall back to the first synonym with images and stop there", async () => {
    const pages = new FakePageSource(new Map([["car", categoryPage(...CAR_THUMBS)]]));
    const synonyms = new FakeSynonymSource({ ok: true, value: ["car", "vehicle"] });
    const resolver = new ImageResolver(pages, synonyms, () => 0.75);

    const resolution = await resolver.resolve("automobile");

    expect(resolution).toEqual({
      state: "Resolved",
      word: "car",
      candidates: CAR_IMAGES,
      imageUrl: CAR_IMAGES[1],
      attempts: ["automobile", "car"],
    });
    expect(pages.requested).toEqual(["automobile", "car"]);
    expect(synonyms.requested).toEqual(["automobile"]);
  });

  test("should be exhausted when there are no images and no synonyms", async () => {
    const pages = new FakePageSource(new Map());
    const synonyms = new FakeSynonymSource({ ok: true, value: [] });
    const resolver = new ImageResolver(pages, synonyms);

    const resolution = await resolver.resolve("zyxwqqq123");

    expect(resolution).toEqual({ state: "Exhausted", attempts: ["zyxwqqq123"] });
    expect(pages.requested).toEqual(["zyxwqqq123"]);
  });

  test("should be exhausted when every synonym comes up empty", async () => {
    const pages = new FakePageSource(
      new Map([["car", categoryPage("/static/icon.png", "https://upload.example.org/a/Car.jpg")]]),
    );
    const synonyms = new FakeSynonymSource({ ok: true, value: ["car", "vehicle", "car"] });
    const resolver = new ImageResolver(pages, synonyms);

    const resolution = await resolver.resolve("automobile");

    expect(resolution).toEqual({
      state: "Exhausted",
      attempts: ["automobile", "car", "vehicle", "car"],
    });
  });

  test("should treat an unavailable synonym service as having no synonyms", async () => {
    const pages = new FakePageSource(new Map());
    const synonyms = new FakeSynonymSource({
      ok: false,
      error: new Error("timeout of 10000ms exceeded"),
    });
    const resolver = new ImageResolver(pages, synonyms);

    const resolution = await resolver.resolve("automobile");

    expect(resolution).toEqual({ state: "Exhausted", attempts: ["automobile"] });
    expect(pages.requested).toEqual(["automobile"]);
  });

  test("should only warn when the synonym service is unavailable", async () => {
    const info = jest.spyOn(logger, "info");
    const warn = jest.spyOn(logger, "warn");
    const synonyms = new FakeSynonymSource({ ok: false, error: new Error("socket hang up") });
    const resolver = new ImageResolver(new FakePageSource(new Map()), synonyms);

    await resolver.resolve("automobile");

    expect(warn).toHaveBeenCalledWith('[Synonyms] Lookup failed for "automobile": socket hang up');
    expect(info).not.toHaveBeenCalledWith('[Resolve] No synonyms found for "automobile"');
  });

  test("should log when the synonym service knows no synonyms", async () => {
    const info = jest.spyOn(logger, "info");
    const resolver = new ImageResolver(
      new FakePageSource(new Map()),
      new FakeSynonymSource({ ok: true, value: [] }),
    );

    await resolver.resolve("automobile");

    expect(info).toHaveBeenCalledWith('[Resolve] No synonyms found for "automobile"');
  });

  test("should treat a failed page fetch as a word without images", async () => {
    const pages = new FakePageSource(
      new Map<string, Fallible<string>>([
        ["automobile", { ok: false, error: new Error("socket hang up") }],
        ["car", { ok: false, error: new Error("Request blocked") }],
        ["vehicle", categoryPage(CAR_THUMBS[0])],
      ]),
    );
    const synonyms = new FakeSynonymSource({ ok: true, value: ["car", "vehicle"] });
    const resolver = new ImageResolver(pages, synonyms);

    const resolution = await resolver.resolve("automobile");

    expect(resolution).toEqual({
      state: "Resolved",
      word: "vehicle",
      candidates: [CAR_IMAGES[0]],
      imageUrl: CAR_IMAGES[0],
      attempts: ["automobile", "car", "vehicle"],
    });
  });

  test("should look up synonyms for the trimmed original word", async () => {
    const pages = new FakePageSource(new Map());
    const synonyms = new FakeSynonymSource({ ok: true, value: [] });
    const resolver = new ImageResolver(pages, synonyms);

    await resolver.resolve("  automobile ");

    expect(pages.requested).toEqual(["automobile"]);
    expect(synonyms.requested).toEqual(["automobile"]);
  });

  test.each([undefined, "", "   "])(
    "should report missing input for %p without any lookups",
    async (word) => {
      const pages = new FakePageSource(new Map());
      const synonyms = new FakeSynonymSource({ ok: true, value: ["car"] });
      const resolver = new ImageResolver(pages, synonyms);

      expect(await resolver.resolve(word)).toEqual({ state: "MissingInput" });
      expect(pages.requested).toEqual([]);
      expect(synonyms.requested).toEqual([]);
    },
  );

  test("should build the candidate list from a single word's page", async () => {
    const logo = "//upload.example.org/thumb/x/xy/Logo.png/50px-Logo.png";
    const pages = new FakePageSource(new Map([["car", categoryPage(...CAR_THUMBS, logo)]]));
    const resolver = new ImageResolver(pages, new FakeSynonymSource({ ok: true, value: [] }));

    expect(await resolver.imagesFor("car")).toEqual(CAR_IMAGES);
    expect(await resolver.imagesFor("boat")).toEqual([]);
  });
});
