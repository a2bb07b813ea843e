import { server } from "../mocks/server";
import { afterAll, afterEach, beforeAll, beforeEach } from "vitest";

// Start MSW server before all tests
beforeAll(() => {
  server.listen({ onUnhandledRequest: "error" });
});

// Baseline: no environment overrides. Test files set their own in beforeEach.
beforeEach(() => {
  delete process.env.CAMPER_API_URL;
  delete process.env.CAMPER_FAN_ID;
  delete process.env.CAMPER_IDENTITY;
});

// Reset handlers after each test
afterEach(() => server.resetHandlers());

// Close server after all tests
afterAll(() => server.close());
