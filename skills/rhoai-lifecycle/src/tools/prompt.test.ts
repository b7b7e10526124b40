import { scriptedAsk } from "../__fixtures__/answers.js";
import { choose, confirm } from "./prompt.js";

describe("prompt", () => {
  let errors: jest.SpyInstance;

  beforeEach(() => {
    errors = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("confirm", () => {
    it.each(["y", "Y", "yes", "Yes", "YES"])("accepts %s", async (reply) => {
      await expect(confirm(scriptedAsk(reply), "Proceed?")).resolves.toBe(true);
    });

    it.each(["n", "N", "no", "No", "NO"])("declines on %s", async (reply) => {
      await expect(confirm(scriptedAsk(reply), "Proceed?")).resolves.toBe(false);
    });

    it("asks again until the answer is recognised", async () => {
      const ask = scriptedAsk("maybe", "", "y");

      await expect(confirm(ask, "Proceed?")).resolves.toBe(true);

      expect(ask.questions).toEqual(["Proceed? (y/n): ", "Proceed? (y/n): ", "Proceed? (y/n): "]);
      expect(errors).toHaveBeenCalledTimes(2);
      expect(errors).toHaveBeenCalledWith("\x1b[0;31m[ERROR]\x1b[0m Invalid input. Please enter 'y' or 'n'");
    });
  });

  describe("choose", () => {
    const choices = [
      { value: "pre" as const, accepted: ["pre", "PRE"] },
      { value: "post" as const, accepted: ["post", "POST"] },
    ];

    it("maps an accepted spelling to its value", async () => {
      await expect(choose(scriptedAsk("POST"), "Stage? ", choices, "bad stage")).resolves.toBe("post");
    });

    it("does not accept spellings outside the list", async () => {
      const ask = scriptedAsk("Pre", "pre");

      await expect(choose(ask, "Stage? ", choices, "bad stage")).resolves.toBe("pre");
      expect(ask.questions).toHaveLength(2);
    });

    it("propagates a failure to read input", async () => {
      await expect(choose(scriptedAsk(), "Stage? ", choices, "bad stage")).rejects.toThrow("Unexpected question: Stage? ");
    });
  });
});
