import { strict as assert } from "node:assert";
import { afterEach, beforeEach, describe, test } from "node:test";

export { afterEach, assert, beforeEach, describe, test };
