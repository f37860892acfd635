import { spawn } from "node:child_process";
import process from "node:process";

export interface OpenCommand {
  command: string;
  args: string[];
}

export function openCommandFor(platform: NodeJS.Platform, url: string): OpenCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      // The empty string is `start`'s window title.
      return { command: "cmd", args: ["/c", "start", "", url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

export function openInBrowser(url: string): Promise<void> {
  const { command, args } = openCommandFor(process.platform, url);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore", detached: true });

    child.once("error", (error) => {
      reject(new Error(`Unable to run ${command}: ${error.message}`));
    });

    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}
