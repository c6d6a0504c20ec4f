import { Key } from "@depwire/core";
import type { Logger } from "@depwire/types";

export const LOGGER = new Key<Logger>("depwire", "logger");
