export class StoreError extends Error {
  constructor(message: string, readonly statusCode: number) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends StoreError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends StoreError {
  constructor(message = "Store not found") {
    super(message, 404);
  }
}

export class RoutingConflictError extends StoreError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** The store exists but is mid-provision; deleting it now would race the install. */
export class StoreBusyError extends StoreError {
  constructor(id: string) {
    super(`store ${id} is still provisioning; retry once it is Ready or Failed`, 409);
  }
}

export class ProvisioningFailureError extends StoreError {
  constructor(message: string) {
    super(message, 500);
  }
}

/** A status change the registry refuses; indicates a bug, not a bad request. */
export class InvalidStatusTransitionError extends Error {
  constructor(readonly storeId: string, readonly from: string, readonly to: string) {
    super(`Illegal status transition for store ${storeId}: ${from} -> ${to}`);
    this.name = "InvalidStatusTransitionError";
  }
}
