/**
 * Zod schemas for list_usb_devices tool parameters.
 */

import { z } from "zod";

export const listUsbDevicesSchema = {
  filter: z
    .string()
    .optional()
    .describe('Only list devices whose name or manufacturer contains this text, e.g. "razer".'),
};
