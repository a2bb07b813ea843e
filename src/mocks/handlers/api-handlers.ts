import { http, HttpResponse } from "msw";

export const TEST_API_URL = "http://localhost:3000";

export const apiHandlers = [
  // POST /api/fancollection/1/collection_items - listCollection
  http.post(`${TEST_API_URL}/api/fancollection/1/collection_items`, () => {
    return HttpResponse.json(
      { items: [], last_token: "end", more_available: false },
      { status: 200 },
    );
  }),

  // POST /api/fancollection/1/wishlist_items - listWishlist
  http.post(`${TEST_API_URL}/api/fancollection/1/wishlist_items`, () => {
    return HttpResponse.json(
      { items: [], last_token: "end", more_available: false },
      { status: 200 },
    );
  }),
];
