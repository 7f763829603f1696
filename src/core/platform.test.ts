import { describe, expect, it } from "vitest";

import {
  executableFileName,
  expandArtifactPattern,
  launcherFileName,
  libraryFileName,
  resolvePlatform,
} from "./platform.js";

describe("platform naming", () => {
  it("resolves auto from the host", () => {
    expect(resolvePlatform("auto", "win32")).toBe("windows");
    expect(resolvePlatform("auto", "linux")).toBe("linux");
    expect(resolvePlatform("windows", "linux")).toBe("windows");
  });

  it("names executables, libraries and launchers per platform", () => {
    expect(executableFileName("ItemEditor", "linux")).toBe("ItemEditor");
    expect(executableFileName("ItemEditor", "windows")).toBe("ItemEditor.exe");
    expect(libraryFileName("PluginOne", "linux")).toBe("libPluginOne.so");
    expect(libraryFileName("PluginOne", "windows")).toBe("PluginOne.dll");
    expect(launcherFileName("ItemEditor", "linux")).toBe("run_itemeditor.sh");
    expect(launcherFileName("ItemEditor", "windows")).toBe("run_itemeditor.bat");
  });
});

describe("expandArtifactPattern", () => {
  it("fills every known placeholder", () => {
    expect(
      expandArtifactPattern("{config}/plugins/{plugin}/{lib}", {
        app: "ItemEditor",
        config: "Release",
        platform: "windows",
        plugin: "PluginOne",
      }),
    ).toBe("Release/plugins/PluginOne/PluginOne.dll");
    expect(
      expandArtifactPattern("bin/{app}{exe}", { app: "ItemEditor", config: "Debug", platform: "linux" }),
    ).toBe("bin/ItemEditor");
  });

  it("leaves unknown or unset placeholders untouched", () => {
    expect(
      expandArtifactPattern("{lib}/{arch}", { app: "ItemEditor", config: "Release", platform: "linux" }),
    ).toBe("{lib}/{arch}");
  });
});
