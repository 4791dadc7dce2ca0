import { describe, it, expect } from "vitest";
import type { Request } from "./context.js";
import { buildMessages, shellFamilyOf } from "./prompt.js";

const request: Request = {
  userText: "  find files larger than 100MB\n",
  osName: "Linux 6.8.0",
  shellName: "bash",
  cwd: "/srv/app",
};

describe("buildMessages", () => {
  it("orders instruction, context, then the user's text", () => {
    const messages = buildMessages(request);
    expect(messages.map((m) => m.role)).toEqual(["system", "system", "user"]);
  });

  it("keeps the user's text verbatim", () => {
    const messages = buildMessages(request);
    expect(messages[2].content).toBe("  find files larger than 100MB\n");
  });

  it("embeds the context fields", () => {
    expect(buildMessages(request)[1].content).toBe(
      "Operating system: Linux 6.8.0\nShell: bash\nCurrent directory: /srv/app"
    );
  });

  it("tells the model to answer with one command for the shell", () => {
    const instruction = buildMessages(request)[0].content;
    expect(instruction).toContain("You are an expert bash command generator for Linux 6.8.0.");
    expect(instruction).toContain("Output MUST be exactly one shell command.");
    expect(instruction).toContain("Prefer standard, widely available Linux/macOS utilities");
  });

  it("switches rules for PowerShell", () => {
    const instruction = buildMessages({ ...request, shellName: "pwsh" })[0].content;
    expect(instruction).toContain("Prefer standard, widely available PowerShell cmdlets");
  });

  it("is deterministic", () => {
    expect(buildMessages(request)).toEqual(buildMessages(request));
  });
});

describe("shellFamilyOf", () => {
  it("classifies shells", () => {
    expect(shellFamilyOf("PowerShell")).toBe("powershell");
    expect(shellFamilyOf("cmd")).toBe("cmd");
    expect(shellFamilyOf("zsh")).toBe("posix");
    expect(shellFamilyOf("unknown shell")).toBe("posix");
  });
});
