import { createCategory } from "../services/categories";
import { createOrder } from "../services/order";
import { registerPerson } from "../services/persons";
import { createProduct } from "../services/products";
import { InMemoryShopStore } from "./inMemoryStore";

export const passwordOptions = { bcryptRounds: 4 };

/** One person, one category and two products priced 10.00 and 19.99. */
export async function seedShop(store = new InMemoryShopStore()) {
  const person = await registerPerson(
    store,
    {
      fullName: "Ann Lee",
      email: "ann.lee@example.com",
      password: "test-password",
      birthDate: null,
    },
    passwordOptions
  );

  const category = await createCategory(store, {
    name: "Stationery",
    description: "",
    parentId: null,
  });

  const notebook = await createProduct(store, {
    name: "Notebook",
    description: "A5 dotted",
    price: "10.00",
    stockQuantity: 40,
    categoryId: category.id,
  });

  const pen = await createProduct(store, {
    name: "Fountain pen",
    description: "",
    price: "19.99",
    stockQuantity: 12,
    categoryId: category.id,
  });

  const order = await createOrder(store, {
    ownerId: person.id,
    status: "processing",
  });

  return { store, person, category, notebook, pen, order };
}
