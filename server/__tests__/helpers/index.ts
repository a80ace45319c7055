export { createMockDb, createMockDbModule } from "./mockDb";
export type { MockQueryChain, MockDb } from "./mockDb";

export { createMockLogger } from "./mockLogger";
export type { MockLogger } from "./mockLogger";

export { MemObjectStore } from "./memObjectStore";
export type { StoredVersion } from "./memObjectStore";

export { createFakeToolRunner, clipInfoJson } from "./fakeTools";
export type { FakeToolOptions, FakeRendition } from "./fakeTools";

export { createMediaHarness, testMediaConfig, PUBLIC_BASE_URL } from "./mediaHarness";
export type { MediaHarness } from "./mediaHarness";
