import { afterEach, beforeEach, describe, expect, spyOn, test, vi } from "#test-compat";
import { currentStock } from "#lib/db/products.ts";
import { handleRequest } from "#routes";
import {
  createTestCategory,
  createTestDb,
  createTestProduct,
  createTestUser,
  getRequest,
  jsonRequest,
  loginAs,
  mockRequest,
  resetDb,
} from "#test-utils";

const DELIVERY = {
  full_name: "Test Buyer",
  address: "1 Test Street",
  phone_number: "5550100",
  city: "Testville",
  postal_code: "TE1 1ST",
};

describe("server (shop)", () => {
  beforeEach(async () => {
    await createTestDb();
    spyOn(console, "debug").mockImplementation(() => undefined);
    spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetDb();
    vi.restoreAllMocks();
  });

  describe("request checks", () => {
    test("rejects other hosts", async () => {
      const response = await handleRequest(
        new Request("http://evil.example/api/products", { headers: { host: "evil.example" } }),
      );
      expect(response.status).toBe(403);
    });

    test("rejects non-JSON bodies", async () => {
      const response = await handleRequest(
        mockRequest("/api/register", {
          method: "POST",
          headers: { "content-type": "application/x-www-form-urlencoded" },
          body: "username=alice",
        }),
      );
      expect(response.status).toBe(400);
      expect(await response.text()).toBe("Bad Request: Invalid Content-Type");
    });

    test("rejects malformed JSON", async () => {
      const response = await handleRequest(
        mockRequest("/api/register", {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: "{",
        }),
      );
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: "Invalid JSON" });
    });

    test("unknown routes are 404 with security headers", async () => {
      const response = await handleRequest(getRequest("/api/nothing-here"));
      expect(response.status).toBe(404);
      expect(response.headers.get("x-content-type-options")).toBe("nosniff");
      expect(response.headers.get("x-frame-options")).toBe("DENY");
    });

    test("logs each request with a redacted path", async () => {
      await handleRequest(getRequest("/api/products/42"));
      expect(vi.mocked(console.debug).mock.calls.at(-1)?.[0]).toMatch(/^\[Request\] GET \/api\/products\/\[id\] 404 \d+ms$/);
    });
  });

  describe("catalog", () => {
    test("GET /api/products lists products", async () => {
      await createTestProduct({ name: "Hat", price: 800 });
      const response = await handleRequest(getRequest("/api/products"));
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject([{ name: "Hat", price: 800 }]);
    });

    test("GET /api/products/:id returns detail or 404", async () => {
      const product = await createTestProduct({ name: "Hat" });
      const found = await handleRequest(getRequest(`/api/products/${product.id}`));
      expect(await found.json()).toMatchObject({ id: product.id, name: "Hat", reviews: [] });
      expect((await handleRequest(getRequest("/api/products/999"))).status).toBe(404);
      expect((await handleRequest(getRequest("/api/products/abc"))).status).toBe(404);
    });

    test("a malformed percent escape in a path is 404", async () => {
      const response = await handleRequest(getRequest("/api/products/%ZZ"));
      expect(response.status).toBe(404);
    });

    test("GET /api/search applies filters from the query string", async () => {
      const hats = await createTestCategory({ productType: "Hats" });
      await createTestProduct({ name: "Cheap Hat", price: 500, categoryId: hats.id });
      await createTestProduct({ name: "Fancy Hat", price: 5000, categoryId: hats.id });
      await createTestProduct({ name: "Hat Stand", price: 900 });

      const response = await handleRequest(
        getRequest("/api/search?q=hat&category=Hats&max_price=1000&sort_by=price_asc"),
      );
      expect(await response.json()).toMatchObject([{ name: "Cheap Hat" }]);
    });

    test("GET /api/categories lists product types", async () => {
      await createTestCategory({ productType: "Hats" });
      const response = await handleRequest(getRequest("/api/categories"));
      expect(await response.json()).toEqual(["Hats"]);
    });

    test("reviews need a login", async () => {
      const product = await createTestProduct();
      const anonymous = await handleRequest(
        jsonRequest("POST", `/api/products/${product.id}/reviews`, { rating: 5, review_text: "Nice" }),
      );
      expect(anonymous.status).toBe(401);

      const cookie = await loginAs(await createTestUser());
      const posted = await handleRequest(
        jsonRequest("POST", `/api/products/${product.id}/reviews`, { rating: 5, review_text: "Nice" }, cookie),
      );
      expect(posted.status).toBe(201);

      const invalid = await handleRequest(
        jsonRequest("POST", `/api/products/${product.id}/reviews`, { rating: 9, review_text: "Nice" }, cookie),
      );
      expect(invalid.status).toBe(400);
    });

    test("GET /api/recommendations returns the three lists", async () => {
      const cookie = await loginAs(await createTestUser());
      const response = await handleRequest(getRequest("/api/recommendations", cookie));
      expect(await response.json()).toEqual({ fromPurchases: [], fromWishlist: [], topRated: [] });
    });
  });

  describe("cart", () => {
    test("requires a login", async () => {
      expect((await handleRequest(getRequest("/api/cart"))).status).toBe(401);
    });

    test("add, update, view and remove", async () => {
      const cookie = await loginAs(await createTestUser());
      const product = await createTestProduct({ price: 1000 });

      const added = await handleRequest(
        jsonRequest("POST", "/api/cart", { product_id: product.id, quantity: 2 }, cookie),
      );
      expect(added.status).toBe(201);
      expect(await added.json()).toMatchObject({ line: { id: 1, quantity: 2 } });

      const updated = await handleRequest(jsonRequest("PUT", "/api/cart/1", { quantity: 3 }, cookie));
      expect(await updated.json()).toMatchObject({ line: { quantity: 3 } });

      const view = await handleRequest(getRequest("/api/cart", cookie));
      expect(await view.json()).toMatchObject({ total: 3000, lines: [{ lineId: 1, quantity: 3 }] });

      const removed = await handleRequest(jsonRequest("DELETE", "/api/cart/1", undefined, cookie));
      expect(removed.status).toBe(200);
      expect((await handleRequest(jsonRequest("DELETE", "/api/cart/1", undefined, cookie))).status).toBe(404);
    });

    test("maps cart errors to statuses", async () => {
      const cookie = await loginAs(await createTestUser());
      const product = await createTestProduct();
      const badQuantity = await handleRequest(
        jsonRequest("POST", "/api/cart", { product_id: product.id, quantity: 0 }, cookie),
      );
      expect(badQuantity.status).toBe(400);
      const missing = await handleRequest(jsonRequest("POST", "/api/cart", { product_id: 999 }, cookie));
      expect(missing.status).toBe(404);
      const noProduct = await handleRequest(jsonRequest("POST", "/api/cart", {}, cookie));
      expect(noProduct.status).toBe(400);
    });

    test("a quantity that is present but not a number is rejected", async () => {
      const cookie = await loginAs(await createTestUser());
      const product = await createTestProduct();
      for (const quantity of ["abc", true, {}, null]) {
        const response = await handleRequest(
          jsonRequest("POST", "/api/cart", { product_id: product.id, quantity }, cookie),
        );
        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
          error: "Quantity must be a whole number of at least 1",
        });
      }
      const view = await handleRequest(getRequest("/api/cart", cookie));
      expect(await view.json()).toEqual({ lines: [], total: 0 });
    });
  });

  describe("wishlist", () => {
    test("add, list and remove", async () => {
      const cookie = await loginAs(await createTestUser());
      const product = await createTestProduct({ name: "Scarf" });

      const added = await handleRequest(jsonRequest("POST", `/api/wishlist/${product.id}`, undefined, cookie));
      expect(added.status).toBe(201);
      const again = await handleRequest(jsonRequest("POST", `/api/wishlist/${product.id}`, undefined, cookie));
      expect(await again.json()).toEqual({ added: false });

      const list = await handleRequest(getRequest("/api/wishlist", cookie));
      expect(await list.json()).toMatchObject([{ product_id: product.id, name: "Scarf" }]);

      const removed = await handleRequest(jsonRequest("DELETE", `/api/wishlist/${product.id}`, undefined, cookie));
      expect(removed.status).toBe(200);
      const gone = await handleRequest(jsonRequest("DELETE", `/api/wishlist/${product.id}`, undefined, cookie));
      expect(gone.status).toBe(404);
    });
  });

  describe("checkout and orders", () => {
    const fillCart = async (cookie: string, productId: number, quantity: number) => {
      await handleRequest(jsonRequest("POST", "/api/cart", { product_id: productId, quantity }, cookie));
    };

    test("POST /api/checkout places the order", async () => {
      const cookie = await loginAs(await createTestUser());
      const product = await createTestProduct({ price: 1000, stock: 5 });
      await fillCart(cookie, product.id, 2);

      const response = await handleRequest(
        jsonRequest("POST", "/api/checkout", { ...DELIVERY, payment_mode: "UPI", upi_id: "buyer@test" }, cookie),
      );

      expect(response.status).toBe(201);
      expect(await response.json()).toMatchObject({
        order: { total_price: 2000, payment_mode: "UPI", items: [{ quantity: 2, unit_price: 1000 }] },
      });
      expect(await currentStock(product.id)).toBe(3);
    });

    test("insufficient stock is 409", async () => {
      const cookie = await loginAs(await createTestUser());
      const product = await createTestProduct({ name: "Rare", stock: 1 });
      await fillCart(cookie, product.id, 2);

      const response = await handleRequest(jsonRequest("POST", "/api/checkout", DELIVERY, cookie));
      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({
        error: "Not enough stock for Rare",
        code: "InsufficientStock",
        product_id: product.id,
      });
    });

    test("an empty cart is 409", async () => {
      const cookie = await loginAs(await createTestUser());
      const response = await handleRequest(jsonRequest("POST", "/api/checkout", DELIVERY, cookie));
      expect(response.status).toBe(409);
      expect(await response.json()).toMatchObject({ code: "EmptyCart" });
    });

    test("missing delivery details are 400", async () => {
      const cookie = await loginAs(await createTestUser());
      const product = await createTestProduct();
      await fillCart(cookie, product.id, 1);
      const response = await handleRequest(
        jsonRequest("POST", "/api/checkout", { ...DELIVERY, postal_code: "" }, cookie),
      );
      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ code: "MissingDeliveryField", field: "postal_code" });
    });

    test("card checkout without a card number is 400", async () => {
      const cookie = await loginAs(await createTestUser());
      const product = await createTestProduct();
      await fillCart(cookie, product.id, 1);
      const response = await handleRequest(
        jsonRequest("POST", "/api/checkout", { ...DELIVERY, payment_mode: "Card" }, cookie),
      );
      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ problem: "MissingCardNumber" });
    });

    test("orders are private to their owner", async () => {
      const owner = await createTestUser();
      const ownerCookie = await loginAs(owner);
      const otherCookie = await loginAs(await createTestUser());
      const product = await createTestProduct({ price: 1000 });
      await fillCart(ownerCookie, product.id, 1);
      await handleRequest(jsonRequest("POST", "/api/checkout", DELIVERY, ownerCookie));

      const mine = await handleRequest(getRequest("/api/orders/1", ownerCookie));
      expect(mine.status).toBe(200);
      expect(await mine.json()).toMatchObject({ id: 1, user_id: owner.id });

      expect((await handleRequest(getRequest("/api/orders/1", otherCookie))).status).toBe(404);
      expect(await (await handleRequest(getRequest("/api/orders", otherCookie))).json()).toEqual([]);
    });

    test("GET /api/dashboard summarises orders", async () => {
      const user = await createTestUser({ username: "dash" });
      const cookie = await loginAs(user);
      const product = await createTestProduct({ price: 1000 });
      await fillCart(cookie, product.id, 2);
      await handleRequest(jsonRequest("POST", "/api/checkout", DELIVERY, cookie));

      const response = await handleRequest(getRequest("/api/dashboard", cookie));
      expect(await response.json()).toMatchObject({
        user: { username: "dash" },
        recent_orders: [{ total_price: 2000 }],
        total_spent: 2000,
      });
    });
  });

  describe("profile", () => {
    test("GET and POST /api/profile", async () => {
      const user = await createTestUser();
      const cookie = await loginAs(user);

      const view = await handleRequest(getRequest("/api/profile", cookie));
      expect(await view.json()).toMatchObject({ user: { id: user.id, email: user.email } });

      const update = await handleRequest(
        jsonRequest("POST", "/api/profile", { email: "new@example.com", dob: "2000-01-31" }, cookie),
      );
      expect(update.status).toBe(200);
      expect(await update.json()).toMatchObject({ user: { email: "new@example.com", dob: "2000-01-31" } });
    });

    test("a wrong current password is 400", async () => {
      const user = await createTestUser();
      const cookie = await loginAs(user);
      const response = await handleRequest(
        jsonRequest(
          "POST",
          "/api/profile",
          { email: user.email, current_password: "wrong", new_password: "x", confirm_password: "x" },
          cookie,
        ),
      );
      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ code: "IncorrectPassword" });
    });
  });
});
