import { afterEach, beforeEach, describe, expect, test } from "#test-compat";
import { addLine, removeLine, setQuantity, snapshot } from "#lib/db/cart.ts";
import { execute } from "#lib/db/client.ts";
import { createTestDb, createTestProduct, createTestUser, expectResultError, resetDb } from "#test-utils";

describe("cart", () => {
  beforeEach(async () => {
    await createTestDb();
  });

  afterEach(() => {
    resetDb();
  });

  describe("addLine", () => {
    test("creates a line with quantity 1 by default", async () => {
      const user = await createTestUser();
      const product = await createTestProduct();
      const result = await addLine(user.id, product.id);
      expect(result.ok).toBe(true);
      if (result.ok) expect(result.line.quantity).toBe(1);
    });

    test("merges repeat adds into one line", async () => {
      const user = await createTestUser();
      const product = await createTestProduct();
      const first = await addLine(user.id, product.id, 2);
      const second = await addLine(user.id, product.id, 3);
      if (!first.ok || !second.ok) throw new Error("addLine failed");
      expect(second.line.id).toBe(first.line.id);
      expect(second.line.quantity).toBe(5);
      expect((await snapshot(user.id)).lines.length).toBe(1);
    });

    test("rejects quantities below one or fractional", async () => {
      const user = await createTestUser();
      const product = await createTestProduct();
      expectResultError("InvalidQuantity")(await addLine(user.id, product.id, 0));
      expectResultError("InvalidQuantity")(await addLine(user.id, product.id, -1));
      expectResultError("InvalidQuantity")(await addLine(user.id, product.id, 1.5));
    });

    test("rejects unknown products", async () => {
      const user = await createTestUser();
      expectResultError("ProductNotFound")(await addLine(user.id, 999));
    });

    test("does not check stock", async () => {
      const user = await createTestUser();
      const product = await createTestProduct({ stock: 1 });
      expect((await addLine(user.id, product.id, 5)).ok).toBe(true);
    });
  });

  describe("setQuantity", () => {
    test("replaces the quantity", async () => {
      const user = await createTestUser();
      const product = await createTestProduct();
      const added = await addLine(user.id, product.id, 2);
      if (!added.ok) throw new Error("addLine failed");
      const result = await setQuantity(user.id, added.line.id, 7);
      expect(result.ok && result.line.quantity).toBe(7);
    });

    test("rejects zero", async () => {
      const user = await createTestUser();
      const product = await createTestProduct();
      const added = await addLine(user.id, product.id);
      if (!added.ok) throw new Error("addLine failed");
      expectResultError("InvalidQuantity")(await setQuantity(user.id, added.line.id, 0));
    });

    test("cannot touch another user's line", async () => {
      const owner = await createTestUser();
      const other = await createTestUser();
      const product = await createTestProduct();
      const added = await addLine(owner.id, product.id);
      if (!added.ok) throw new Error("addLine failed");
      expectResultError("LineNotFound")(await setQuantity(other.id, added.line.id, 3));
    });
  });

  describe("removeLine", () => {
    test("removes the line", async () => {
      const user = await createTestUser();
      const product = await createTestProduct();
      const added = await addLine(user.id, product.id);
      if (!added.ok) throw new Error("addLine failed");
      expect((await removeLine(user.id, added.line.id)).ok).toBe(true);
      expect((await snapshot(user.id)).lines).toEqual([]);
    });

    test("reports a missing line", async () => {
      const user = await createTestUser();
      expectResultError("LineNotFound")(await removeLine(user.id, 42));
    });
  });

  describe("snapshot", () => {
    test("orders lines by product id and totals them", async () => {
      const user = await createTestUser();
      const shirt = await createTestProduct({ name: "Shirt", price: 1000 });
      const socks = await createTestProduct({ name: "Socks", price: 250, imageUrl: "/socks.jpg" });
      await addLine(user.id, socks.id, 2);
      await addLine(user.id, shirt.id, 1);

      const cart = await snapshot(user.id);

      expect(cart.lines).toEqual([
        {
          lineId: 2,
          productId: shirt.id,
          name: "Shirt",
          imageUrl: null,
          unitPrice: 1000,
          quantity: 1,
          lineTotal: 1000,
          stock: 10,
        },
        {
          lineId: 1,
          productId: socks.id,
          name: "Socks",
          imageUrl: "/socks.jpg",
          unitPrice: 250,
          quantity: 2,
          lineTotal: 500,
          stock: 10,
        },
      ]);
      expect(cart.total).toBe(1500);
    });

    test("prices at the current product price", async () => {
      const user = await createTestUser();
      const product = await createTestProduct({ price: 1000 });
      await addLine(user.id, product.id, 2);
      await execute("UPDATE products SET price = 1200 WHERE id = ?", [product.id]);
      expect((await snapshot(user.id)).total).toBe(2400);
    });

    test("an empty cart totals zero", async () => {
      const user = await createTestUser();
      expect(await snapshot(user.id)).toEqual({ lines: [], total: 0 });
    });
  });
});
