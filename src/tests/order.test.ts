import { describe, expect, it, vi } from "vitest";
import {
  addOrderItem,
  createOrder,
  deleteOrder,
  getOrder,
  listOrders,
  removeOrderItem,
  saveOrder,
  updateOrderItem,
} from "../services/order";
import { NotFoundError, ValidationError } from "../utils/errors";
import { seedShop } from "./fixtures";

describe("createOrder", () => {
  it("starts processing with a 0.00 total", async () => {
    const { order, person } = await seedShop();

    expect(order.owner_id).toBe(person.id);
    expect(order.status).toBe("processing");
    expect(order.total).toBe("0.00");
  });

  it("requires an existing owner", async () => {
    const { store } = await seedShop();

    await expect(
      createOrder(store, { ownerId: 999, status: "processing" })
    ).rejects.toThrow("Person 999 not found");
  });
});

describe("saveOrder", () => {
  it("writes fields and total with a single update", async () => {
    const { store, order, pen } = await seedShop();
    await addOrderItem(store, order.id, { productId: pen.id, quantity: 2 });
    const update = vi.spyOn(store.orders, "update");

    const saved = await saveOrder(store, order.id, { status: "shipping" });

    expect(update).toHaveBeenCalledTimes(1);
    expect(update).toHaveBeenCalledWith(order.id, {
      status: "shipping",
      total: "39.98",
    });
    expect(saved.status).toBe("shipping");
    expect(saved.total).toBe("39.98");
    expect(saved.items).toHaveLength(1);
  });

  it("checks a new owner exists", async () => {
    const { store, order } = await seedShop();

    await expect(saveOrder(store, order.id, { ownerId: 999 })).rejects.toThrow(
      "Person 999 not found"
    );
  });
});

describe("getOrder", () => {
  it("returns items with their line prices", async () => {
    const { store, order, notebook, pen } = await seedShop();
    await addOrderItem(store, order.id, { productId: notebook.id, quantity: 2 });
    await addOrderItem(store, order.id, { productId: pen.id, quantity: 3 });

    const detail = await getOrder(store, order.id);

    expect(
      detail.items.map((item) => [item.product_name, item.item_price])
    ).toEqual([
      ["Notebook", "20.00"],
      ["Fountain pen", "59.97"],
    ]);
  });

  it("throws for a missing order", async () => {
    const { store } = await seedShop();

    await expect(getOrder(store, 999)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("order items", () => {
  it("leaves the total alone under the manual policy", async () => {
    const { store, order, pen } = await seedShop();

    const result = await addOrderItem(
      store,
      order.id,
      { productId: pen.id, quantity: 1 },
      "manual"
    );

    expect(result.orderTotal).toBe("0.00");
    expect((await store.orders.findById(order.id))?.total).toBe("0.00");
  });

  it("re-totals on every mutation under the auto policy", async () => {
    const { store, order, notebook, pen } = await seedShop();

    const added = await addOrderItem(
      store,
      order.id,
      { productId: notebook.id, quantity: 1 },
      "auto"
    );
    expect(added.orderTotal).toBe("10.00");

    const second = await addOrderItem(
      store,
      order.id,
      { productId: pen.id, quantity: 1 },
      "auto"
    );
    const updated = await updateOrderItem(
      store,
      order.id,
      second.item.id,
      3,
      "auto"
    );
    expect(updated.item.quantity).toBe(3);
    expect(updated.orderTotal).toBe("69.97");

    const removed = await removeOrderItem(
      store,
      order.id,
      added.item.id,
      "auto"
    );
    expect(removed.orderTotal).toBe("59.97");
    expect((await store.orders.findById(order.id))?.total).toBe("59.97");
  });

  it("rejects items of another order", async () => {
    const { store, order, person, pen } = await seedShop();
    const other = await createOrder(store, {
      ownerId: person.id,
      status: "processing",
    });
    const { item } = await addOrderItem(store, other.id, {
      productId: pen.id,
      quantity: 1,
    });

    await expect(
      updateOrderItem(store, order.id, item.id, 2)
    ).rejects.toThrow(`Order item ${item.id} not found`);
  });

  it("refuses a line price above 99999999.99", async () => {
    const { store, order, pen } = await seedShop();

    const fits = await addOrderItem(store, order.id, {
      productId: pen.id,
      quantity: 5002501,
    });
    expect(fits.item.quantity).toBe(5002501);

    const attempt = addOrderItem(store, order.id, {
      productId: pen.id,
      quantity: 5002502,
    });
    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toThrow("Line price exceeds 99999999.99");
    expect(store.rows.orderItems).toHaveLength(1);
  });

  it("refuses mutations that push the order total past 99999999.99", async () => {
    const { store, order, notebook, pen } = await seedShop();
    const { item } = await addOrderItem(
      store,
      order.id,
      { productId: notebook.id, quantity: 9999999 },
      "auto"
    );

    await expect(
      addOrderItem(store, order.id, { productId: pen.id, quantity: 1 }, "auto")
    ).rejects.toThrow("Order total would exceed 99999999.99");
    await expect(
      updateOrderItem(store, order.id, item.id, 10000000, "auto")
    ).rejects.toThrow("Line price exceeds 99999999.99");

    // the line being changed is not counted twice
    const same = await updateOrderItem(store, order.id, item.id, 9999999, "auto");
    expect(same.orderTotal).toBe("99999990.00");
    expect(store.rows.orderItems).toHaveLength(1);
    expect((await store.orders.findById(order.id))?.total).toBe("99999990.00");
  });

  it("rolls back when the product is missing", async () => {
    const { store, order } = await seedShop();

    await expect(
      addOrderItem(store, order.id, { productId: 999, quantity: 1 })
    ).rejects.toThrow("Product 999 not found");
    expect(store.rows.orderItems).toHaveLength(0);
  });
});

describe("deleteOrder", () => {
  it("removes the order and its items", async () => {
    const { store, order, person, notebook, pen } = await seedShop();
    const kept = await createOrder(store, {
      ownerId: person.id,
      status: "processing",
    });
    await addOrderItem(store, order.id, { productId: notebook.id, quantity: 1 });
    await addOrderItem(store, order.id, { productId: pen.id, quantity: 1 });
    await addOrderItem(store, kept.id, { productId: pen.id, quantity: 1 });

    await deleteOrder(store, order.id);

    expect(await store.orders.findById(order.id)).toBeUndefined();
    expect(store.rows.orderItems.map((item) => item.order_id)).toEqual([
      kept.id,
    ]);
  });
});

describe("listOrders", () => {
  it("filters by owner and status, newest first", async () => {
    const { store, order, person } = await seedShop();
    const shipped = await createOrder(store, {
      ownerId: person.id,
      status: "shipping",
    });

    const all = await listOrders(store, { ownerId: person.id });
    expect(all.map((row) => row.id)).toEqual([shipped.id, order.id]);

    const shipping = await listOrders(store, { status: "shipping" });
    expect(shipping.map((row) => row.id)).toEqual([shipped.id]);
  });
});
