// test/vitest.setup.ts
import { EventEmitter } from "events";
import { vi, afterEach } from "vitest";

EventEmitter.defaultMaxListeners = 20;

afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
});
