import { z } from 'zod/v4';

/**
 * Zod schema for one stored flight. The canonical fields are typed;
 * any other field is carried text (or a number written by another tool).
 */
export const storedFlightSchema = z
  .object({
    flight_id: z.string(),
    origin: z.string(),
    destination: z.string(),
    departure_datetime: z.string(),
    arrival_datetime: z.string(),
    price: z.number(),
  })
  .catchall(z.union([z.string(), z.number()]));

/** Zod schema for the database document: a JSON array of flights. */
export const databaseFileSchema = z.array(storedFlightSchema);
