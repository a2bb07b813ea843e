/**
 * MSW Node Server Setup
 *
 * Intercepts fetch at the network level so tests never reach Bandcamp.
 */

import { setupServer } from "msw/node";
import { handlers } from "./handlers";

export const server = setupServer(...handlers);
