/**
 * Handle-based surface for foreign-call wrappers.
 *
 * Stores live behind integer handles; every fallible call reports a Status
 * instead of throwing, so a wrapper can map results onto its own calling
 * convention. Each HandleTable is independent of every other.
 */

import { RuntimeStore, StoreOptions } from './runtime/store';
import { ConfValue, ScalarValue } from './runtime/values';
import { ConfError, ConfErrorType } from './runtime/errors';

export enum Status {
  Ok = 0,
  IoError = 1,
  LexError = 2,
  ParseError = 3,
  NamespaceNotFound = 4,
  VariableNotFound = 5,
  TypeMismatch = 6,
  StructuralMismatch = 7,
  DuplicateKey = 8,
  NamespaceExists = 9,
  InvalidName = 10,
  InvalidHandle = 11,
  CircularReference = 12,
  InvalidAccess = 13,
}

export type FailureStatus = Exclude<Status, Status.Ok>;

export type Handle = number;

export type BindingResult<T> =
  | { status: Status.Ok; value: T }
  | { status: FailureStatus; message: string };

const STATUS_BY_ERROR: Record<ConfErrorType, FailureStatus> = {
  IoError: Status.IoError,
  LexError: Status.LexError,
  ParseError: Status.ParseError,
  NamespaceNotFound: Status.NamespaceNotFound,
  VariableNotFound: Status.VariableNotFound,
  TypeMismatch: Status.TypeMismatch,
  StructuralMismatch: Status.StructuralMismatch,
  DuplicateKey: Status.DuplicateKey,
  NamespaceExists: Status.NamespaceExists,
  InvalidName: Status.InvalidName,
  CircularReference: Status.CircularReference,
  InvalidAccess: Status.InvalidAccess,
};

export class HandleTable {
  private stores: Map<Handle, RuntimeStore> = new Map();
  private nextHandle: Handle = 1;
  private lastErrorMessage: string | undefined;

  constructor(private options: StoreOptions = {}) {}

  create(): Handle {
    return this.register(new RuntimeStore(this.options));
  }

  createFrom(filePath: string): BindingResult<Handle> {
    return this.capture(() => this.register(RuntimeStore.fromFile(filePath, this.options)));
  }

  loadFile(handle: Handle, filePath: string): Status {
    return this.invoke(handle, store => { store.loadFile(filePath); }).status;
  }

  loadText(handle: Handle, text: string): Status {
    return this.invoke(handle, store => { store.loadText(text); }).status;
  }

  /** Release a store. The handle is never reused. */
  destroy(handle: Handle): Status {
    const store = this.stores.get(handle);
    if (!store) {
      return this.invalidHandle(handle).status;
    }
    store.clear();
    this.stores.delete(handle);
    return Status.Ok;
  }

  getString(handle: Handle, namespace: string, variable: string): BindingResult<string> {
    return this.invoke(handle, store => store.getString(namespace, variable));
  }

  getInteger(handle: Handle, namespace: string, variable: string): BindingResult<bigint> {
    return this.invoke(handle, store => store.getInteger(namespace, variable));
  }

  getFloat(handle: Handle, namespace: string, variable: string): BindingResult<number> {
    return this.invoke(handle, store => store.getFloat(namespace, variable));
  }

  getBoolean(handle: Handle, namespace: string, variable: string): BindingResult<boolean> {
    return this.invoke(handle, store => store.getBoolean(namespace, variable));
  }

  getList(handle: Handle, namespace: string, variable: string): BindingResult<ConfValue[]> {
    return this.invoke(handle, store => store.getList(namespace, variable));
  }

  flattenList(handle: Handle, namespace: string, variable: string): BindingResult<ScalarValue[]> {
    return this.invoke(handle, store => store.flattenList(namespace, variable));
  }

  asDict(handle: Handle, namespace: string, variable: string): BindingResult<Map<string, ConfValue>> {
    return this.invoke(handle, store => store.asDict(namespace, variable));
  }

  listNamespaces(handle: Handle): BindingResult<string[]> {
    return this.invoke(handle, store => store.listNamespaces());
  }

  listVariables(handle: Handle, namespace: string): BindingResult<string[]> {
    return this.invoke(handle, store => store.listVariables(namespace));
  }

  /** Message of the most recent failed call on this table. */
  lastError(): string | undefined {
    return this.lastErrorMessage;
  }

  openHandles(): number {
    return this.stores.size;
  }

  private register(store: RuntimeStore): Handle {
    const handle = this.nextHandle++;
    this.stores.set(handle, store);
    return handle;
  }

  private invoke<T>(handle: Handle, operation: (store: RuntimeStore) => T): BindingResult<T> {
    const store = this.stores.get(handle);
    if (!store) {
      return this.invalidHandle(handle);
    }
    return this.capture(() => operation(store));
  }

  private capture<T>(operation: () => T): BindingResult<T> {
    try {
      return { status: Status.Ok, value: operation() };
    } catch (error) {
      // Anything that is not a ConfError is a bug, not a status
      if (!(error instanceof ConfError)) throw error;
      this.lastErrorMessage = error.message;
      return { status: STATUS_BY_ERROR[error.errorType], message: error.message };
    }
  }

  private invalidHandle(handle: Handle): { status: Status.InvalidHandle; message: string } {
    const message = `InvalidHandle: no store is registered under handle ${handle}`;
    this.lastErrorMessage = message;
    return { status: Status.InvalidHandle, message };
  }
}
