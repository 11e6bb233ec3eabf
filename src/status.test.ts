import { describe, expect, it } from "vitest";
import { StatusManager } from "./status";

describe("StatusManager", () => {
  it("tracks indexing and profile progress", () => {
    const status = new StatusManager({ version: "9.9.9", startedAt: "2026-01-01T00:00:00Z" });
    status.setDocumentsRoot("/srv/tenders");
    status.setIndexTotals(4, 12);
    status.incEmbedded(10);
    status.incEmbedded();
    status.incSkipped();
    status.setProfiles(2, 5);
    status.markTransport("http");
    status.markReady();
    expect(status.getStatus()).toEqual({
      version: "9.9.9",
      documentsRoot: "/srv/tenders",
      modelName: "",
      transport: "http",
      ready: true,
      startedAt: "2026-01-01T00:00:00Z",
      indexing: { filesDiscovered: 4, chunksTotal: 12, chunksEmbedded: 11, filesSkipped: 1 },
      profiles: { profilesLoaded: 2, capabilitiesEmbedded: 5 },
    });
    expect(JSON.parse(JSON.stringify(status)).ready).toBe(true);
  });
});
