import type { RegistrationFailure, UpdateFailure } from '../../../libs/accounts/account.js';
import { HttpError, badRequest, notFound } from '../../../libs/errors/httpErrors.js';
import { MIN_PASSWORD_LENGTH } from '../../../libs/accounts/account.js';

/**
 * Account failure reasons → transport errors. The store never picks status codes.
 */
export function registrationFailure(reason: RegistrationFailure): HttpError {
    switch (reason) {
        case 'DUPLICATE_USERNAME':
            return badRequest('Username already registered');
        case 'DUPLICATE_EMAIL':
            return badRequest('Email already registered');
        case 'WEAK_PASSWORD':
            return new HttpError(422, `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
    }
}

export function updateFailure(reason: UpdateFailure): HttpError {
    switch (reason) {
        case 'NOT_FOUND':
            return notFound('User not found');
        case 'DUPLICATE_EMAIL':
            return badRequest('Email already registered');
    }
}
