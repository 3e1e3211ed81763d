import { afterAll, afterEach, beforeAll } from "vitest";
import { setupServer } from "msw/node";

import { FakeStorageService } from "./mocks/fakeService";

export const service = new FakeStorageService();

export const server = setupServer(...service.handlers);

beforeAll(() => server.listen({ onUnhandledRequest: "error" }));

afterEach(() => {
  server.resetHandlers();
  service.reset();
});

afterAll(() => server.close());
