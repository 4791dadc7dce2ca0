import * as os from "os";
import { basename } from "path";

export type OsFamily = "linux" | "macos" | "windows" | "wsl" | "unknown";

export interface ShellContext {
  osName: string;
  osFamily: OsFamily;
  shellName: string;
  shellPath: string;
  cwd: string;
}

export type Request = Readonly<{
  userText: string;
  osName: string;
  shellName: string;
  cwd: string;
}>;

export interface ProbeHost {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  release: string;
  type: string;
  cwd: () => string;
}

const defaultHost = (): ProbeHost => ({
  env: process.env,
  platform: process.platform,
  release: os.release(),
  type: os.type(),
  cwd: () => process.cwd(),
});

function detectFamily(host: ProbeHost): OsFamily {
  switch (host.platform) {
    case "win32":
      return "windows";
    case "darwin":
      return "macos";
    case "linux":
      if (
        host.env.WSL_DISTRO_NAME ||
        host.env.WSL_INTEROP ||
        host.release.toLowerCase().includes("microsoft")
      ) {
        return "wsl";
      }
      return "linux";
    default:
      return "unknown";
  }
}

function describeOs(host: ProbeHost, family: OsFamily): string {
  const name = family === "macos" ? "macOS" : host.type || "unknown OS";
  const release = host.release ? ` ${host.release}` : "";
  return family === "wsl" ? `${name}${release} (WSL)` : `${name}${release}`;
}

function detectShellPath(host: ProbeHost): string {
  const fromEnv = host.env.SHELL || host.env.COMSPEC;
  if (fromEnv) return fromEnv;
  return host.platform === "win32" ? "powershell.exe" : "/bin/sh";
}

export function shellNameOf(shellPath: string): string {
  // basename() on posix does not split on backslashes
  const last = shellPath.split("\\").pop() ?? "";
  const name = basename(last).replace(/\.exe$/i, "");
  return name || "unknown shell";
}

function currentDirectory(host: ProbeHost): string {
  try {
    return host.cwd();
  } catch {
    // cwd() throws when the directory has been removed under us
    return host.env.PWD || "unknown directory";
  }
}

/**
 * Reads OS, shell and working directory from the process environment.
 * Never throws: anything that cannot be read degrades to a placeholder.
 */
export function probeContext(host: ProbeHost = defaultHost()): ShellContext {
  const osFamily = detectFamily(host);
  const shellPath = detectShellPath(host);
  return {
    osName: describeOs(host, osFamily),
    osFamily,
    shellName: shellNameOf(shellPath),
    shellPath,
    cwd: currentDirectory(host),
  };
}

export function createRequest(userText: string, context: ShellContext): Request {
  return Object.freeze({
    userText,
    osName: context.osName,
    shellName: context.shellName,
    cwd: context.cwd,
  });
}
