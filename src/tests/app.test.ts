import { Server } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../app";
import { InMemoryShopStore } from "./inMemoryStore";

let server: Server;
let baseUrl: string;
const store = new InMemoryShopStore();

beforeAll(async () => {
  const app = createApp({
    store,
    config: { orderTotalPolicy: "manual", bcryptRounds: 4 },
  });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Test server is not bound to a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve()))
  );
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

async function call(method: string, path: string, body?: unknown) {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? {} : { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const text = await response.text();
  const json: unknown = text ? JSON.parse(text) : undefined;
  return { status: response.status, json };
}

describe("HTTP API", () => {
  it("answers the health check", async () => {
    expect(await call("GET", "/health")).toEqual({
      status: 200,
      json: { status: "ok" },
    });
  });

  it("runs an order through items and recomputation", async () => {
    const person = await call("POST", "/persons", {
      fullName: "Cy Park",
      email: "cy@example.com",
      password: "test-password",
    });
    expect(person.status).toBe(201);
    expect(person.json).toMatchObject({ id: 1, email: "cy@example.com" });
    expect(person.json).not.toHaveProperty("password_hash");

    const category = await call("POST", "/categories", { name: "Desk" });
    expect(category).toEqual({
      status: 201,
      json: { id: 2, name: "Desk", description: "", parent_id: null },
    });

    const lamp = await call("POST", "/products", {
      name: "Lamp",
      price: 19.99,
      categoryId: 2,
    });
    expect(lamp.status).toBe(201);
    expect(lamp.json).toMatchObject({ id: 3, price: "19.99", stock_quantity: 1 });

    const order = await call("POST", "/orders", { ownerId: 1 });
    expect(order.status).toBe(201);
    expect(order.json).toMatchObject({ id: 4, status: "processing", total: "0.00" });

    const item = await call("POST", "/orders/4/items", {
      productId: 3,
      quantity: 3,
    });
    expect(item).toEqual({
      status: 201,
      json: {
        item: { id: 5, order_id: 4, product_id: 3, quantity: 3 },
        orderTotal: "0.00",
      },
    });

    const recomputed = await call("POST", "/orders/4/recompute");
    expect(recomputed).toEqual({
      status: 200,
      json: { id: 4, total: "59.97" },
    });

    const detail = await call("GET", "/orders/4");
    expect(detail.json).toMatchObject({
      total: "59.97",
      items: [{ product_name: "Lamp", unit_price: "19.99", item_price: "59.97" }],
    });

    const shipped = await call("PATCH", "/orders/4", { status: "shipping" });
    expect(shipped.json).toMatchObject({ status: "shipping", total: "59.97" });

    const checked = await call("POST", "/persons/1/password/check", {
      password: "test-password",
    });
    expect(checked).toEqual({ status: 200, json: { valid: true } });

    expect((await call("DELETE", "/orders/4")).status).toBe(204);
    expect((await call("GET", "/orders/4")).json).toEqual({
      error: "Order 4 not found",
    });
  });

  it("validates bodies and params", async () => {
    const review = await call("POST", "/reviews", {
      productId: 1,
      personId: 1,
      rating: 7,
      review: "Too good",
    });
    expect(review.status).toBe(400);

    const badId = await call("GET", "/orders/abc");
    expect(badId.status).toBe(400);
    expect(badId.json).toMatchObject({ error: "Invalid request" });
  });

  it("answers 404 for missing records", async () => {
    expect(await call("GET", "/products/999")).toEqual({
      status: 404,
      json: { error: "Product 999 not found" },
    });
  });
});
