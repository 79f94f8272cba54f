import { ReviewFilter, ShopStore } from "../types/store";
import { NotFoundError } from "../utils/errors";
import { ReviewCreateRequest } from "../validations/review";

export async function createReview(
  store: ShopStore,
  request: ReviewCreateRequest
) {
  const product = await store.products.findById(request.productId);
  if (!product) {
    throw new NotFoundError("Product", request.productId);
  }
  const person = await store.persons.findById(request.personId);
  if (!person) {
    throw new NotFoundError("Person", request.personId);
  }

  return store.reviews.insert({
    product_id: request.productId,
    person_id: request.personId,
    rating: request.rating,
    review: request.review,
  });
}

export async function listReviews(store: ShopStore, filter: ReviewFilter = {}) {
  return store.reviews.list(filter);
}

export async function deleteReview(store: ShopStore, reviewId: number) {
  const deleted = await store.reviews.deleteById(reviewId);
  if (deleted === 0) {
    throw new NotFoundError("Review", reviewId);
  }
}
