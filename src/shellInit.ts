import { HANDOFF_ENV } from "./handoff.js";

export type WrapperShell = "bash" | "zsh";

function wrapper(historyCommand: string): string {
  return `sayso() {
    local handoff rc cmd
    handoff="$(mktemp "\${TMPDIR:-/tmp}/sayso.XXXXXX")" || return 1
    ${HANDOFF_ENV}="$handoff" command sayso "$@"
    rc=$?
    if [ $rc -eq 0 ] && [ -s "$handoff" ]; then
        cmd="$(cat "$handoff")"
        rm -f "$handoff"
        ${historyCommand} "$cmd"
        eval "$cmd"
        return $?
    fi
    rm -f "$handoff"
    return $rc
}`;
}

export function detectWrapperShell(
  requested?: string,
  env: NodeJS.ProcessEnv = process.env
): WrapperShell {
  const shell = requested || env.SHELL || "";
  return shell.includes("zsh") ? "zsh" : "bash";
}

/** Function to eval from .bashrc/.zshrc: `eval "$(sayso --shell-init)"`. */
export function shellInitScript(shell: WrapperShell): string {
  return wrapper(shell === "zsh" ? "print -s" : "history -s");
}
