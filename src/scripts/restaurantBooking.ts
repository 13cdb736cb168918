import definition from "../data/restaurant-booking.json";
import { parseDialogScript, type DialogScript } from "../core/DialogScript";

/**
 * The bundled table-booking script: party size, then time, then confirmation
 */
export function loadRestaurantBookingScript(): DialogScript {
  return parseDialogScript(definition);
}
