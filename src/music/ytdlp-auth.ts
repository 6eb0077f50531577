import fs from 'fs';
import path from 'path';

export type YtDlpAuth =
  | { mode: 'none' }
  | { mode: 'cookies-file'; cookiesPath: string }
  | { mode: 'browser'; browserSpec: string };

let authLogPrinted = false;

function resolveCookiesPath(candidate: string, cwd: string): string | null {
  const trimmed = candidate.trim();
  if (!trimmed) return null;
  const resolved = path.isAbsolute(trimmed) ? trimmed : path.resolve(cwd, trimmed);
  return fs.existsSync(resolved) ? resolved : null;
}

/**
 * Browser cookies win over a cookies file; `cookies.txt` in the working
 * directory is picked up when nothing is configured.
 */
export function getYtDlpAuth(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): YtDlpAuth {
  const browserSpec = env.YTDLP_COOKIES_FROM_BROWSER?.trim();
  if (browserSpec) {
    return { mode: 'browser', browserSpec };
  }

  const configuredPath = env.YTDLP_COOKIES_PATH?.trim();
  if (configuredPath) {
    const resolved = resolveCookiesPath(configuredPath, cwd);
    if (resolved) {
      return { mode: 'cookies-file', cookiesPath: resolved };
    }
    console.warn(`[yt-dlp] YTDLP_COOKIES_PATH=${configuredPath} does not exist, ignoring`);
  }

  const defaultPath = path.resolve(cwd, 'cookies.txt');
  if (fs.existsSync(defaultPath)) {
    return { mode: 'cookies-file', cookiesPath: defaultPath };
  }

  return { mode: 'none' };
}

export function ytDlpAuthArgs(auth: YtDlpAuth): string[] {
  switch (auth.mode) {
    case 'browser':
      return ['--cookies-from-browser', auth.browserSpec];
    case 'cookies-file':
      return ['--cookies', auth.cookiesPath];
    default:
      return [];
  }
}

export function logYtDlpAuthContext(auth: YtDlpAuth): void {
  if (authLogPrinted) return;
  authLogPrinted = true;

  if (auth.mode === 'browser') {
    console.log(`[yt-dlp] Auth mode: cookies-from-browser (${auth.browserSpec})`);
    return;
  }
  if (auth.mode === 'cookies-file') {
    console.log(`[yt-dlp] Auth mode: cookies file (${auth.cookiesPath})`);
    try {
      const ageMs = Date.now() - fs.statSync(auth.cookiesPath).mtimeMs;
      const ageDays = Math.floor(ageMs / (1000 * 60 * 60 * 24));
      if (ageDays >= 7) {
        console.warn(`[yt-dlp] Cookies file is ${ageDays} days old; refresh it if requests get rejected.`);
      }
    } catch (error) {
      console.warn('[yt-dlp] Could not stat cookies file:', error);
    }
    return;
  }

  console.log('[yt-dlp] Auth mode: none');
}
