import bcrypt from "bcryptjs";
import slugify from "slugify";
import { Person, PersonUpdate } from "../types/db";
import { PersonFilter, ShopRepositories, ShopStore } from "../types/store";
import { ConflictError, NotFoundError } from "../utils/errors";
import {
  PersonRegisterRequest,
  PersonUpdateRequest,
} from "../validations/person";
import { deleteOrdersWithin } from "./order";

const SLUG_MAX_LENGTH = 50;

export interface PasswordOptions {
  bcryptRounds: number;
}

export type PublicPerson = Omit<Person, "password_hash">;

export function toPublicPerson(person: Person): PublicPerson {
  const { password_hash: _hash, ...rest } = person;
  return rest;
}

export function slugFromEmail(email: string) {
  const slug = slugify(email, { lower: true, strict: true, trim: true });
  return slug.slice(0, SLUG_MAX_LENGTH - 4) || "person";
}

/** `base`, then `base-2`, `base-3`, ... until one is free. */
async function uniqueSlug(trx: ShopRepositories, base: string) {
  let candidate = base;
  for (let suffix = 2; await trx.persons.findBySlug(candidate); suffix++) {
    candidate = `${base}-${suffix}`;
  }
  return candidate;
}

async function ensureEmailFree(
  trx: ShopRepositories,
  email: string,
  personId?: number
) {
  const existing = await trx.persons.findByEmail(email);
  if (existing && existing.id !== personId) {
    throw new ConflictError(`Email ${email} is already registered`);
  }
}

async function findPerson(trx: ShopRepositories, personId: number) {
  const person = await trx.persons.findById(personId);
  if (!person) {
    throw new NotFoundError("Person", personId);
  }
  return person;
}

export async function registerPerson(
  store: ShopStore,
  request: PersonRegisterRequest,
  options: PasswordOptions
) {
  const passwordHash = await bcrypt.hash(request.password, options.bcryptRounds);

  return store.transaction(async (trx) => {
    await ensureEmailFree(trx, request.email);

    const person = await trx.persons.insert({
      full_name: request.fullName,
      email: request.email,
      birth_date: request.birthDate,
      slug: await uniqueSlug(trx, slugFromEmail(request.email)),
      password_hash: passwordHash,
    });

    console.log(`Registered person ${person.id} (${person.slug})`);
    return toPublicPerson(person);
  });
}

export async function setPassword(
  store: ShopStore,
  personId: number,
  rawPassword: string,
  options: PasswordOptions
) {
  await findPerson(store, personId);
  const passwordHash = await bcrypt.hash(rawPassword, options.bcryptRounds);
  await store.persons.update(personId, { password_hash: passwordHash });
}

export async function checkPassword(
  store: ShopStore,
  personId: number,
  rawPassword: string
) {
  const person = await findPerson(store, personId);
  return bcrypt.compare(rawPassword, person.password_hash);
}

export async function getPerson(store: ShopStore, personId: number) {
  return toPublicPerson(await findPerson(store, personId));
}

export async function getPersonBySlug(store: ShopStore, slug: string) {
  const person = await store.persons.findBySlug(slug);
  if (!person) {
    throw new NotFoundError("Person", slug);
  }
  return toPublicPerson(person);
}

export async function listPersons(store: ShopStore, filter: PersonFilter = {}) {
  const persons = await store.persons.list(filter);
  return persons.map(toPublicPerson);
}

export async function updatePerson(
  store: ShopStore,
  personId: number,
  request: PersonUpdateRequest
) {
  return store.transaction(async (trx) => {
    await findPerson(trx, personId);

    const values: PersonUpdate = {};
    if (request.email !== undefined) {
      await ensureEmailFree(trx, request.email, personId);
      values.email = request.email;
    }
    if (request.fullName !== undefined) values.full_name = request.fullName;
    if (request.birthDate !== undefined) values.birth_date = request.birthDate;

    const person = await trx.persons.update(personId, values);
    if (!person) {
      throw new NotFoundError("Person", personId);
    }
    return toPublicPerson(person);
  });
}

/** Deletes a person with their reviews, orders and order items. */
export async function deletePerson(store: ShopStore, personId: number) {
  return store.transaction(async (trx) => {
    await findPerson(trx, personId);

    const reviews = await trx.reviews.deleteByPersons([personId]);
    const orderIds = await trx.orders.listIdsByOwner(personId);
    const { orders, items } = await deleteOrdersWithin(trx, orderIds);
    await trx.persons.deleteById(personId);

    console.log(
      `Deleted person ${personId} with ${orders} orders, ${items} order items and ${reviews} reviews`
    );
    return { orders, items, reviews };
  });
}
