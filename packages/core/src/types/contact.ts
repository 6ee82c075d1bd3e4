/**
 * Contact Types
 */

export interface Contact {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  /** Calendar date, `YYYY-MM-DD` */
  birthday: string;
  notes: string | null;
  /** Creator of the record; null once that user is gone */
  userId: number | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Writable fields of a contact. Create and full update take the same shape.
 */
export interface ContactInput {
  firstName: string;
  lastName: string;
  email: string;
  phone?: string | null;
  birthday: string;
  notes?: string | null;
}
