import { apiHandlers } from "./api-handlers";

export const handlers = [...apiHandlers];
