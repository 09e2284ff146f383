/**
 * Multer configuration for file uploads
 */

import multer from "multer";

// Kept in memory; the conversion writes the bytes into its own workspace
const storage = multer.memoryStorage();

/**
 * Single "file" field. No size or type filter: confirming rights is the
 * only gate on uploads.
 */
export const upload = multer({
  storage,
  limits: {
    files: 1,
  },
});
