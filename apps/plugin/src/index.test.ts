import { describe, expect, it, vi } from "vitest";

import { createTestProfile } from "@keywordmarks/db/testUtils";

import type { LauncherApi } from "./launcher";
import { createPlugin, settingsFromRecord } from "./index";

const api: LauncherApi = {
  openUrl: vi.fn(async () => {}),
  openSettingsMenu: vi.fn(async () => {}),
  showMessage: vi.fn(async () => {}),
  copyToClipboard: vi.fn(async () => {}),
  revealFile: vi.fn(async () => {}),
};

describe("createPlugin", () => {
  it("answers keyword queries from real profile stores", async () => {
    const personal = await createTestProfile(
      [{ id: 1, url: "https://mail.a.com/" }],
      [{ keyword: "mail", placeId: 1 }],
    );
    const work = await createTestProfile(
      [{ id: 1, url: "https://mail.b.com/" }],
      [{ keyword: "mail", placeId: 1 }],
    );
    const settings = settingsFromRecord({
      profile_path_data: `${personal}\r\nw|${work}`,
    });
    const plugin = createPlugin(api);

    const [plain] = await plugin.query("mail", settings);
    const [prefixed] = await plugin.query("wmail", settings);

    expect(plain?.subTitle).toBe("https://mail.a.com/");
    expect(prefixed?.subTitle).toBe("https://mail.b.com/");
    expect(prefixed?.contextData).toEqual({
      kind: "bookmark",
      profilePath: work,
      firefoxDir: null,
      keyword: "wmail",
      url: "https://mail.b.com/",
    });
  });
});
