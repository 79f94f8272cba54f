import { describe, expect, it, vi } from "vitest";
import { createCategory } from "../services/categories";
import { addOrderItem, saveOrder } from "../services/order";
import {
  createProduct,
  deleteProduct,
  getAllProducts,
  productImagePath,
  updateProduct,
} from "../services/products";
import { escapeLikePattern } from "../db/store";
import { ConflictError } from "../utils/errors";
import { seedShop } from "./fixtures";

describe("productImagePath", () => {
  it("embeds the product id", () => {
    expect(productImagePath(7, "photo.jpg")).toBe(
      "products/updated_at/product_7_photo.jpg"
    );
  });
});

describe("product service", () => {
  it("stores the image path after the insert", async () => {
    const { store, category } = await seedShop();

    const product = await createProduct(store, {
      name: "Stapler",
      description: "",
      price: "7.25",
      stockQuantity: 1,
      categoryId: category.id,
      imageFilename: "stapler.png",
    });

    expect(product.image).toBe(
      `products/updated_at/product_${product.id}_stapler.png`
    );
  });

  it("keeps names unique within a category", async () => {
    const { store, category } = await seedShop();
    const other = await createCategory(store, {
      name: "Gifts",
      description: "",
      parentId: null,
    });

    await expect(
      createProduct(store, {
        name: "Notebook",
        description: "",
        price: "1.00",
        stockQuantity: 1,
        categoryId: category.id,
      })
    ).rejects.toBeInstanceOf(ConflictError);

    const gift = await createProduct(store, {
      name: "Notebook",
      description: "",
      price: "12.00",
      stockQuantity: 1,
      categoryId: other.id,
    });
    expect(gift.category_id).toBe(other.id);

    await expect(
      updateProduct(store, gift.id, { categoryId: category.id })
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it("searches product and category names", async () => {
    const { store, notebook, pen } = await seedShop();

    const byProduct = await getAllProducts(store, { search: "PEN" });
    expect(byProduct.data.map((row) => row.id)).toEqual([pen.id]);

    const byCategory = await getAllProducts(store, { search: "stationery" });
    expect(byCategory.data.map((row) => row.id)).toEqual([pen.id, notebook.id]);
  });

  it("treats LIKE wildcards in a search term literally", async () => {
    const { store } = await seedShop();

    expect(escapeLikePattern("50%_off\\")).toBe("50\\%\\_off\\\\");
    expect((await getAllProducts(store, { search: "%" })).data).toEqual([]);
    expect((await getAllProducts(store, { search: "_" })).data).toEqual([]);
  });

  it("updates price and clears the image", async () => {
    const { store, pen } = await seedShop();
    await updateProduct(store, pen.id, { imageFilename: "pen.jpg" });

    const updated = await updateProduct(store, pen.id, {
      price: "21.50",
      imageFilename: null,
    });

    expect(updated.price).toBe("21.50");
    expect(updated.image).toBeNull();
  });

  it("removes order items and re-totals their orders on delete", async () => {
    const { store, order, notebook, pen } = await seedShop();
    await addOrderItem(store, order.id, { productId: notebook.id, quantity: 1 });
    await addOrderItem(store, order.id, { productId: pen.id, quantity: 3 });
    expect((await saveOrder(store, order.id, {})).total).toBe("69.97");

    const result = await deleteProduct(store, pen.id);

    expect(result.orderItems).toBe(1);
    expect(result.affectedOrders).toEqual([order.id]);
    expect((await store.orders.findById(order.id))?.total).toBe("10.00");
    expect(await store.products.findById(pen.id)).toBeUndefined();
  });

  it("locks the products before reading the orders they touch", async () => {
    const { store, pen } = await seedShop();
    const lock = vi.spyOn(store.products, "lockByIds");
    const listOrders = vi.spyOn(store.orderItems, "listOrderIdsByProducts");

    await deleteProduct(store, pen.id);

    expect(lock).toHaveBeenCalledWith([pen.id]);
    expect(lock.mock.invocationCallOrder[0]).toBeLessThan(
      listOrders.mock.invocationCallOrder[0]
    );
  });

  it("re-totals an order that gains the product while it is deleted", async () => {
    const { store, order, notebook, pen } = await seedShop();
    await addOrderItem(
      store,
      order.id,
      { productId: notebook.id, quantity: 1 },
      "auto"
    );

    await Promise.all([
      addOrderItem(store, order.id, { productId: pen.id, quantity: 3 }, "auto"),
      deleteProduct(store, pen.id),
    ]);

    expect(
      store.rows.orderItems.filter((item) => item.product_id === pen.id)
    ).toEqual([]);
    expect((await store.orders.findById(order.id))?.total).toBe("10.00");
  });
});
