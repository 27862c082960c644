/**
 * Reference to a content-addressed block. `cid` is derived from the block's
 * canonical encoding (see cidOf), so equal content always has an equal link.
 */
export class Link {
  constructor(readonly cid: string) {}

  toString(): string {
    return this.cid;
  }

  toJSON(): { '/': string } {
    return { '/': this.cid };
  }
}

export interface DataMap {
  [key: string]: DataValue;
}

export type DataValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Link
  | DataValue[]
  | DataMap;

export interface StoredBlock {
  cid: string;
  value: DataValue;
  createdAt: Date | null;
}

/** Read side of a block store: everything a NodeAccessor needs. */
export interface BlockSource {
  /** `undefined` when no block has that cid. */
  get(cid: string): Promise<DataValue | undefined>;
}

export interface BlockStore extends BlockSource {
  put(value: DataValue): Promise<Link>;
  has(cid: string): Promise<boolean>;
}

export function isLink(value: DataValue): value is Link {
  return value instanceof Link;
}

export function isDataMap(value: DataValue): value is DataMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Link)
  );
}
