import { spawn } from "child_process";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describeError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export interface CommandEditor {
  edit(command: string): Promise<string>;
}

export type EditorLauncher = (editor: string, file: string) => Promise<number | null>;

const launchEditor: EditorLauncher = (editor, file) =>
  new Promise((resolve, reject) => {
    const editorProcess = spawn(editor, [file], {
      stdio: "inherit",
      shell: true,
    });
    editorProcess.on("error", (err) => reject(err));
    editorProcess.on("close", (code) => resolve(code));
  });

export function resolveEditor(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  return env.VISUAL || env.EDITOR || (platform === "win32" ? "notepad" : "nano");
}

/**
 * Opens the command in the user's editor through a temp file and returns
 * what was saved. Falls back to the original command when the editor
 * fails to start or exits non-zero.
 */
export class TempFileEditor implements CommandEditor {
  constructor(
    private readonly editor: string = resolveEditor(),
    private readonly logger: Logger = silentLogger,
    private readonly launch: EditorLauncher = launchEditor,
    private readonly directory: string = tmpdir()
  ) {}

  async edit(command: string): Promise<string> {
    const tempFilePath = join(this.directory, `sayso-command-${process.pid}.sh`);
    this.logger.debug(`Opening command in editor: ${this.editor}`, { file: tempFilePath });

    try {
      await fs.writeFile(tempFilePath, command);
      const code = await this.launch(this.editor, tempFilePath);
      if (code !== 0) {
        this.logger.warn(`Editor exited with code ${code}; keeping the original command.`);
        return command;
      }
      const modified = (await fs.readFile(tempFilePath, "utf-8")).trim();
      return modified || command;
    } catch (error) {
      this.logger.warn(`Failed to edit command: ${describeError(error)}`);
      return command;
    } finally {
      await fs.rm(tempFilePath, { force: true });
    }
  }
}
