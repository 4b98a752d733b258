/**
 * Entries of the per-file structure-type table.
 */

export interface Field {
  /** Field name without pointer markers or array dimensions. */
  readonly name: string;
  /** Name of the field's type as listed in the table (for pointers, the pointee type). */
  readonly typeName: string;
  readonly isPointer: boolean;
  /** Product of all array dimensions; 1 for scalars. */
  readonly arrayLength: number;
  /** Byte offset from the start of the owning struct. */
  readonly offset: number;
  /** Total byte size of the field (element size times array length). */
  readonly size: number;
  /** Byte size of one array element. */
  readonly elementSize: number;
}

export interface StructType {
  /** Index of this struct in the table; block headers refer to it. */
  readonly index: number;
  readonly name: string;
  readonly size: number;
  readonly fields: readonly Field[];
}
