import { chromium, type Browser, type Page } from "playwright";
import type { CanvasSize } from "../schema/source.js";
import { PX_PER_INCH } from "../constants.js";

/**
 * Launch a Chromium browser with environment-aware defaults.
 *
 * Set CHROMIUM_PATH to use a system browser instead of Playwright's bundled
 * download; the sandbox flags containers need are added with it.
 */
export async function launchBrowser(): Promise<Browser> {
  const executablePath = process.env.CHROMIUM_PATH;
  if (executablePath) {
    return chromium.launch({
      executablePath,
      args: ["--no-sandbox", "--disable-dev-shm-usage"],
    });
  }
  return chromium.launch();
}

/**
 * Open a page whose viewport holds the whole canvas, so nothing wraps or
 * scrolls differently from the slide. One page per concurrent conversion.
 */
export async function openRenderingPage(
  browser: Browser,
  canvas: CanvasSize
): Promise<Page> {
  const page = await browser.newPage();
  await page.setViewportSize({
    width: Math.ceil(canvas.width * PX_PER_INCH),
    height: Math.ceil(canvas.height * PX_PER_INCH),
  });
  return page;
}
