/**
 * Home Controller
 * Serves the conversion form.
 */

import type { Request, Response } from "express";
import { buildHomePage } from "../services/business/pageService.js";

const homePage = buildHomePage();

/**
 * GET / - Static form page
 */
export function getHomePage(_req: Request, res: Response): void {
  res.type("html").send(homePage);
}
