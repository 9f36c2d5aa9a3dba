import { afterEach, describe, expect, it } from "vitest"

import { collectStatus, formatStatusReport } from "../../src/runtime/status.js"
import { createFakeSupervisor } from "../support/fake-supervisor.js"
import { cleanupTempDirs, createTempDir, writeTree } from "../support/temp-dirs.js"

afterEach(cleanupTempDirs)

describe("collectStatus and formatStatusReport", () => {
  it("renders every section in order", async () => {
    // Arrange
    const dataDir = await createTempDir("openclaw-status-")
    await writeTree(dataDir, { "data/a": "12345", "config/models.json": "{}" })
    const history = {
      recentHistory: async () => [
        { id: "0123456789abcdef", committedAt: "2026-10-18T12:00:00Z", subject: "auto: change" },
      ],
    }

    // Act
    const report = await collectStatus({
      dataDir,
      logLines: 25,
      historyLines: 10,
      supervisor: createFakeSupervisor(),
      history,
    })

    // Assert
    expect(formatStatusReport(report)).toBe(
      [
        "== service ==",
        "openclaw-gateway.service active (running)",
        "",
        "== last 25 log lines ==",
        "openclaw-gateway last 25: gateway listening",
        "",
        "== disk usage ==",
        "2B\tconfig/",
        "5B\tdata/",
        "",
        "== history (last 10) ==",
        "0123456 auto: change",
      ].join("\n")
    )
  })

  it("keeps other sections when one source fails and hides disabled history", async () => {
    // Arrange
    const dataDir = await createTempDir("openclaw-status-")
    const supervisor = createFakeSupervisor()
    supervisor.status = async () => {
      throw new Error("systemctl not found")
    }
    supervisor.recentLogs = async () => ""

    // Act
    const report = await collectStatus({
      dataDir,
      logLines: 5,
      historyLines: 10,
      supervisor,
      history: null,
    })

    // Assert
    expect(formatStatusReport(report)).toBe(
      [
        "== service ==",
        "(unavailable: systemctl not found)",
        "",
        "== last 5 log lines ==",
        "(no log lines)",
        "",
        "== disk usage ==",
        "(empty)",
      ].join("\n")
    )
  })
})
