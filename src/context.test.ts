import { describe, it, expect } from "vitest";
import { createRequest, probeContext, shellNameOf, type ProbeHost } from "./context.js";

function host(overrides: Partial<ProbeHost> = {}): ProbeHost {
  return {
    env: {},
    platform: "linux",
    release: "6.8.0-45-generic",
    type: "Linux",
    cwd: () => "/home/dev/project",
    ...overrides,
  };
}

describe("probeContext", () => {
  it("reads OS, shell and cwd on Linux", () => {
    const context = probeContext(host({ env: { SHELL: "/usr/bin/zsh" } }));
    expect(context).toEqual({
      osName: "Linux 6.8.0-45-generic",
      osFamily: "linux",
      shellName: "zsh",
      shellPath: "/usr/bin/zsh",
      cwd: "/home/dev/project",
    });
  });

  it("detects WSL from the kernel release", () => {
    const context = probeContext(
      host({ env: { SHELL: "/bin/bash" }, release: "5.15.153.1-microsoft-standard-WSL2" })
    );
    expect(context.osFamily).toBe("wsl");
    expect(context.osName).toBe("Linux 5.15.153.1-microsoft-standard-WSL2 (WSL)");
  });

  it("detects WSL from the environment", () => {
    const context = probeContext(host({ env: { WSL_DISTRO_NAME: "Ubuntu" } }));
    expect(context.osFamily).toBe("wsl");
  });

  it("names macOS", () => {
    const context = probeContext(
      host({ platform: "darwin", type: "Darwin", release: "23.4.0", env: { SHELL: "/bin/zsh" } })
    );
    expect(context.osFamily).toBe("macos");
    expect(context.osName).toBe("macOS 23.4.0");
  });

  it("uses COMSPEC on Windows", () => {
    const context = probeContext(
      host({
        platform: "win32",
        type: "Windows_NT",
        release: "10.0.22631",
        env: { COMSPEC: "C:\\Windows\\System32\\cmd.exe" },
      })
    );
    expect(context.osFamily).toBe("windows");
    expect(context.shellName).toBe("cmd");
  });

  it("falls back to the platform default shell", () => {
    expect(probeContext(host()).shellPath).toBe("/bin/sh");
    expect(probeContext(host()).shellName).toBe("sh");
    expect(probeContext(host({ platform: "win32" })).shellName).toBe("powershell");
  });

  it("degrades when the working directory is gone", () => {
    const gone = () => {
      throw new Error("ENOENT: uv_cwd");
    };
    expect(probeContext(host({ cwd: gone, env: { PWD: "/tmp/removed" } })).cwd).toBe("/tmp/removed");
    expect(probeContext(host({ cwd: gone })).cwd).toBe("unknown directory");
  });

  it("reports an unknown family for other platforms", () => {
    expect(probeContext(host({ platform: "freebsd", type: "FreeBSD" })).osFamily).toBe("unknown");
  });
});

describe("shellNameOf", () => {
  it("strips directories and .exe", () => {
    expect(shellNameOf("/opt/homebrew/bin/fish")).toBe("fish");
    expect(shellNameOf("C:\\Program Files\\PowerShell\\7\\pwsh.exe")).toBe("pwsh");
  });

  it("uses a placeholder for an empty path", () => {
    expect(shellNameOf("")).toBe("unknown shell");
  });
});

describe("createRequest", () => {
  it("builds a frozen request from the context", () => {
    const context = probeContext(host({ env: { SHELL: "/bin/bash" } }));
    const request = createRequest("show disk usage", context);
    expect(request).toEqual({
      userText: "show disk usage",
      osName: "Linux 6.8.0-45-generic",
      shellName: "bash",
      cwd: "/home/dev/project",
    });
    expect(Object.isFrozen(request)).toBe(true);
  });
});
