import {
	LocalIdAlreadyDeclaredError,
	LocalIdNotFoundError,
	type LocalIdError,
	RequestBodyError,
	UnsupportedOperationError,
} from "./operation-errors.js";
import { HookError, ResourceNotFoundError } from "./resource-errors.js";

/**
 * Errors that point into the request body.
 */
export type PointerError =
	| LocalIdError
	| UnsupportedOperationError
	| RequestBodyError
	| ResourceNotFoundError
	| HookError;

export const operationPointer = (operationIndex: number): string =>
	`/atomic:operations[${operationIndex}]`;

/**
 * Rebuild an error with its source pointer replaced by `update(current)`.
 */
export function mapPointer(
	error: LocalIdError,
	update: (current: string) => string,
): LocalIdError;
export function mapPointer(
	error: PointerError,
	update: (current: string) => string,
): PointerError;
export function mapPointer(
	error: PointerError,
	update: (current: string) => string,
): PointerError {
	const pointer = update(error.pointer ?? "");
	switch (error._tag) {
		case "LocalIdAlreadyDeclaredError":
			return new LocalIdAlreadyDeclaredError({
				localId: error.localId,
				resourceType: error.resourceType,
				pointer,
				message: error.message,
			});
		case "LocalIdNotFoundError":
			return new LocalIdNotFoundError({
				localId: error.localId,
				resourceType: error.resourceType,
				reason: error.reason,
				pointer,
				message: error.message,
			});
		case "UnsupportedOperationError":
			return new UnsupportedOperationError({
				operation: error.operation,
				resourceType: error.resourceType,
				pointer,
				message: error.message,
			});
		case "RequestBodyError":
			return new RequestBodyError({
				title: error.title,
				detail: error.detail,
				pointer,
				message: error.message,
			});
		case "ResourceNotFoundError":
			return new ResourceNotFoundError({
				resourceType: error.resourceType,
				id: error.id,
				relationshipName: error.relationshipName,
				pointer,
				message: error.message,
			});
		case "HookError":
			return new HookError({
				hook: error.hook,
				resourceType: error.resourceType,
				reason: error.reason,
				pointer,
				message: error.message,
			});
	}
}

/**
 * Prefix the pointer with the location of the operation it came from.
 */
export function prefixWithOperation(
	error: LocalIdError,
	operationIndex: number,
): LocalIdError;
export function prefixWithOperation(
	error: PointerError,
	operationIndex: number,
): PointerError;
export function prefixWithOperation(
	error: PointerError,
	operationIndex: number,
): PointerError {
	return mapPointer(
		error,
		(current) => operationPointer(operationIndex) + current,
	);
}
