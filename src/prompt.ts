import type { Request } from "./context.js";

export type ChatRole = "system" | "user";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

type ShellFamily = "powershell" | "cmd" | "posix";

export function shellFamilyOf(shellName: string): ShellFamily {
  const name = shellName.toLowerCase();
  if (name === "powershell" || name === "pwsh") return "powershell";
  if (name === "cmd") return "cmd";
  return "posix";
}

const SHELL_RULES: Record<ShellFamily, string> = {
  powershell: `Prefer standard, widely available PowerShell cmdlets (e.g., 'Get-ChildItem', 'Select-Object', 'Remove-Item', 'Where-Object', 'Move-Item').`,
  cmd: `Use cmd.exe built-ins and programs that ship with Windows (e.g., 'dir', 'copy', 'del', 'findstr', 'where').`,
  posix: `Prefer standard, widely available Linux/macOS utilities (e.g., 'grep', 'find', 'ls', 'rm', 'mv').`,
};

function instruction(request: Request): string {
  const rules = SHELL_RULES[shellFamilyOf(request.shellName)];
  return `You are an expert ${request.shellName} command generator for ${request.osName}.
A user will provide a request in natural language. Your ONLY task is to convert this request
into a single, executable, syntactically correct ${request.shellName} command.

Crucial Rules:
1. Output MUST be exactly one shell command. Do not include any explanations, surrounding text,
   or markdown formatting (no code fences, no backticks).
2. The output must be ready to be pasted directly into a terminal.
3. ${rules}`;
}

function contextBlock(request: Request): string {
  return [
    `Operating system: ${request.osName}`,
    `Shell: ${request.shellName}`,
    `Current directory: ${request.cwd}`,
  ].join("\n");
}

// instruction, then context, then the user's words untouched
export function buildMessages(request: Request): ChatMessage[] {
  return [
    { role: "system", content: instruction(request) },
    { role: "system", content: contextBlock(request) },
    { role: "user", content: request.userText },
  ];
}
