export { createCallLog, type CallLog } from "./callLog.js";
export { afterEach, assert, beforeEach, describe, test } from "./nodeTest.js";
