import { access, constants } from "fs/promises";
import { delimiter, join } from "path";

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function installLocations(platform: NodeJS.Platform): string[] {
  if (platform === "darwin") {
    return [
      "/Applications/Chromium.app/Contents/MacOS/Chromium",
      "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome"
    ];
  }

  if (platform === "win32") {
    const programFiles = process.env.PROGRAMFILES || "C:\\Program Files";
    const programFilesX86 = process.env["PROGRAMFILES(X86)"] || "C:\\Program Files (x86)";
    return [
      join(programFiles, "Google", "Chrome", "Application", "chrome.exe"),
      join(programFilesX86, "Google", "Chrome", "Application", "chrome.exe")
    ];
  }

  // Alpine and Debian container images ship Chromium here.
  return ["/usr/bin/chromium-browser", "/usr/bin/chromium"];
}

const PATH_BINARIES = ["chromium-browser", "chromium", "google-chrome-stable", "google-chrome"];

async function findInPath(binary: string, platform: NodeJS.Platform): Promise<string | null> {
  const pathValue = process.env.PATH;
  if (!pathValue) return null;

  const names = platform === "win32" ? [`${binary}.exe`] : [binary];
  for (const dir of pathValue.split(delimiter)) {
    if (!dir) continue;
    for (const name of names) {
      const fullPath = join(dir, name);
      if (await isExecutable(fullPath)) return fullPath;
    }
  }
  return null;
}

/** Resolves the Chromium binary the search session drives; the override wins when it is executable. */
export async function findChromeExecutable(
  overridePath?: string,
  platform: NodeJS.Platform = process.platform
): Promise<string | null> {
  if (overridePath && await isExecutable(overridePath)) {
    return overridePath;
  }

  for (const candidate of installLocations(platform)) {
    if (await isExecutable(candidate)) return candidate;
  }

  for (const binary of PATH_BINARIES) {
    const found = await findInPath(binary, platform);
    if (found) return found;
  }

  return null;
}
