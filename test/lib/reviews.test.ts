import { afterEach, beforeEach, describe, expect, test } from "#test-compat";
import { getReviewsForProduct, submitReview } from "#lib/db/reviews.ts";
import { createTestDb, createTestProduct, createTestUser, expectResultError, resetDb } from "#test-utils";

describe("reviews", () => {
  beforeEach(async () => {
    await createTestDb();
  });

  afterEach(() => {
    resetDb();
  });

  test("stores trimmed review text", async () => {
    const user = await createTestUser({ username: "critic" });
    const product = await createTestProduct();
    expect(await submitReview(user.id, product.id, 5, "  Lovely  ")).toEqual({ ok: true });
    const [review] = await getReviewsForProduct(product.id);
    expect(review?.review_text).toBe("Lovely");
    expect(review?.username).toBe("critic");
  });

  test("lists newest first", async () => {
    const user = await createTestUser();
    const product = await createTestProduct();
    await submitReview(user.id, product.id, 2, "First");
    await submitReview(user.id, product.id, 4, "Second");
    expect((await getReviewsForProduct(product.id)).map((r) => r.review_text)).toEqual([
      "Second",
      "First",
    ]);
  });

  test("rating must be a whole number from 1 to 5", async () => {
    const user = await createTestUser();
    const product = await createTestProduct();
    expectResultError("InvalidReview")(await submitReview(user.id, product.id, 0, "Meh"));
    expectResultError("InvalidReview")(await submitReview(user.id, product.id, 6, "Wow"));
    expectResultError("InvalidReview")(await submitReview(user.id, product.id, 3.5, "Hmm"));
  });

  test("text must not be blank", async () => {
    const user = await createTestUser();
    const product = await createTestProduct();
    expectResultError("InvalidReview")(await submitReview(user.id, product.id, 3, "   "));
  });

  test("unknown products are refused", async () => {
    const user = await createTestUser();
    expectResultError("ProductNotFound")(await submitReview(user.id, 999, 3, "Where?"));
  });
});
