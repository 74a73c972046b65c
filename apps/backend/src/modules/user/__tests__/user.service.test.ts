/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ObjectId } from 'mongodb';
import type { ICreateUserInput, IEntityReference } from '@quire/types';
import { UserService, USER_COLLECTION } from '../services/user.service.js';
import { PasswordService } from '../../auth/password.service.js';
import {
    HashError,
    InvalidCredentialsError,
    InvalidIdError,
    NotFoundError,
    NotPersistedError,
    QueryError,
    SaltGenerationError,
    ValidationError
} from '../../../lib/errors.js';
import { createMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import type { MockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';

const HEX_64 = /^[0-9a-f]{64}$/;

function createInput(overrides: Partial<ICreateUserInput> = {}): ICreateUserInput {
    return {
        username: 'alice',
        password: 'test-password',
        email: 'alice@example.com',
        firstname: 'Alice',
        lastname: 'Martin',
        ...overrides
    };
}

describe('UserService', () => {
    let mockDb: MockDatabaseService;
    let passwordService: PasswordService;
    let logger: MockLogger;
    let service: UserService;

    beforeEach(() => {
        mockDb = createMockDatabaseService();
        passwordService = new PasswordService({ cost: 1024 });
        logger = new MockLogger();

        UserService.resetInstance();
        UserService.setDependencies(mockDb, passwordService, logger);
        service = UserService.getInstance();
    });

    // ============================================================================
    // Singleton
    // ============================================================================

    describe('singleton', () => {
        it('should throw when getInstance() is called before setDependencies()', () => {
            UserService.resetInstance();

            expect(() => UserService.getInstance()).toThrow(
                'UserService.setDependencies() must be called before getInstance()'
            );
        });

        it('should keep the first instance when setDependencies() is called again', () => {
            UserService.setDependencies(createMockDatabaseService(), passwordService, logger);

            expect(UserService.getInstance()).toBe(service);
        });
    });

    // ============================================================================
    // add
    // ============================================================================

    describe('add', () => {
        it('should store the account with a hex hash and salt', async () => {
            const user = await service.add(createInput());

            expect(user.id).toMatch(/^[0-9a-f]{24}$/);
            expect(user).toMatchObject({
                username: 'alice',
                email: 'alice@example.com',
                firstname: 'Alice',
                lastname: 'Martin'
            });
            expect(user.password).toMatch(HEX_64);
            expect(user.salt).toMatch(HEX_64);
            expect(user.password).not.toBe('test-password');

            const stored = mockDb.getCollectionData(USER_COLLECTION);
            expect(stored).toHaveLength(1);
            expect(stored[0].password).toBe(user.password);
            expect(stored[0].salt).toBe(user.salt);
        });

        it('should store a hash that verifies against the plaintext', async () => {
            const user = await service.add(createInput());

            const valid = await passwordService.checkPassword(
                'test-password',
                Buffer.from(user.salt, 'hex'),
                Buffer.from(user.password, 'hex')
            );
            expect(valid).toBe(true);
        });

        it('should generate a fresh salt per account', async () => {
            const first = await service.add(createInput({ username: 'alice' }));
            const second = await service.add(createInput({ username: 'bob' }));

            expect(first.salt).not.toBe(second.salt);
            expect(first.password).not.toBe(second.password);
        });

        it('should insert and read back inside one session', async () => {
            await service.add(createInput());

            expect(mockDb.sessions).toEqual({ started: 1, ended: 1 });
            expect(logger.info).toHaveBeenCalledWith(
                expect.objectContaining({ username: 'alice' }),
                'User created'
            );
        });

        it('should throw NotPersistedError on a duplicate username once indexes exist', async () => {
            await service.createIndexes();
            await service.add(createInput());

            const error = await service.add(createInput({ email: 'other@example.com' })).catch(e => e);

            expect(error).toBeInstanceOf(NotPersistedError);
            expect(error.message).toBe('User not saved');
            expect(mockDb.getCollectionData(USER_COLLECTION)).toHaveLength(1);
            expect(mockDb.sessions).toEqual({ started: 2, ended: 2 });
        });

        it('should wrap an insert failure in NotPersistedError with the cause', async () => {
            const cause = new Error('write concern failed');
            mockDb.injectError(USER_COLLECTION, 'insertOne', cause);

            const error = await service.add(createInput()).catch(e => e);

            expect(error).toBeInstanceOf(NotPersistedError);
            expect(error.code).toBe('NOT_PERSISTED');
            expect(error.details).toEqual({ cause });
            expect(mockDb.sessions).toEqual({ started: 1, ended: 1 });
        });

        it('should wrap a read-back failure in NotPersistedError', async () => {
            mockDb.injectError(USER_COLLECTION, 'findOne', new Error('socket closed'));

            await expect(service.add(createInput())).rejects.toBeInstanceOf(NotPersistedError);
        });

        it('should throw SaltGenerationError without touching the store when no salt is produced', async () => {
            vi.spyOn(passwordService, 'generateSalt').mockRejectedValue(new Error('entropy unavailable'));

            const error = await service.add(createInput()).catch(e => e);

            expect(error).toBeInstanceOf(SaltGenerationError);
            expect(error.message).toBe('Error when generating salt');
            expect(mockDb.sessions.started).toBe(0);
            expect(mockDb.getCollectionData(USER_COLLECTION)).toHaveLength(0);
        });

        it('should throw HashError without touching the store when hashing fails', async () => {
            vi.spyOn(passwordService, 'hashPassword').mockRejectedValue(new Error('out of memory'));

            const error = await service.add(createInput()).catch(e => e);

            expect(error).toBeInstanceOf(HashError);
            expect(error.message).toBe('Error when hashing password');
            expect(mockDb.sessions.started).toBe(0);
        });
    });

    // ============================================================================
    // getById
    // ============================================================================

    describe('getById', () => {
        it('should return the stored account', async () => {
            const created = await service.add(createInput());

            const user = await service.getById(created.id);

            expect(user).toEqual(created);
        });

        it('should throw InvalidIdError for a malformed id without opening a session', async () => {
            const error = await service.getById('not-an-id').catch(e => e);

            expect(error).toBeInstanceOf(InvalidIdError);
            expect(error.message).toBe('Incorrect ID');
            expect(mockDb.sessions.started).toBe(0);
        });

        it('should throw NotFoundError for an unknown id', async () => {
            const id = new ObjectId().toHexString();

            const error = await service.getById(id).catch(e => e);

            expect(error).toBeInstanceOf(NotFoundError);
            expect(error.message).toBe('No user');
            expect(error.details).toEqual({ id });
        });

        it('should wrap store faults in QueryError', async () => {
            const created = await service.add(createInput());
            const cause = new Error('primary stepped down');
            mockDb.injectError(USER_COLLECTION, 'findOne', cause);

            const error = await service.getById(created.id).catch(e => e);

            expect(error).toBeInstanceOf(QueryError);
            expect(error.code).toBe('QUERY_FAILED');
            expect(error.details).toEqual({ id: created.id, cause });
            expect(mockDb.sessions.started).toBe(mockDb.sessions.ended);
        });
    });

    // ============================================================================
    // get (credential check)
    // ============================================================================

    describe('get', () => {
        it('should return the account for matching credentials', async () => {
            const created = await service.add(createInput());

            const user = await service.get('alice', 'test-password');

            expect(user).toEqual(created);
        });

        it('should throw InvalidCredentialsError for a wrong password', async () => {
            await service.add(createInput());

            const error = await service.get('alice', 'wrong-password').catch(e => e);

            expect(error).toBeInstanceOf(InvalidCredentialsError);
            expect(error.message).toBe('Invalid username or password');
        });

        it('should throw the same error for an unknown username', async () => {
            await service.add(createInput());

            const unknown = await service.get('mallory', 'test-password').catch(e => e);
            const wrong = await service.get('alice', 'wrong-password').catch(e => e);

            expect(unknown).toBeInstanceOf(InvalidCredentialsError);
            expect(unknown.message).toBe(wrong.message);
            expect(unknown.code).toBe(wrong.code);
        });

        it('should throw HashError when verification itself fails', async () => {
            await service.add(createInput());
            const cause = new Error('kdf unavailable');
            vi.spyOn(passwordService, 'checkPassword').mockRejectedValue(cause);

            const error = await service.get('alice', 'test-password').catch(e => e);

            expect(error).toBeInstanceOf(HashError);
            expect(error.message).toBe('Error when verifying password');
            expect(error.details).toEqual({ cause });
        });

        it('should report a failed lookup as invalid credentials', async () => {
            await service.add(createInput());
            const cause = new Error('connection reset');
            mockDb.injectError(USER_COLLECTION, 'findOne', cause);

            const error = await service.get('alice', 'test-password').catch(e => e);
            const wrong = await service.get('alice', 'wrong-password').catch(e => e);

            expect(error).toBeInstanceOf(InvalidCredentialsError);
            expect(error.message).toBe(wrong.message);
            expect(error.code).toBe(wrong.code);
            expect(error.details).toEqual({ cause });
            expect(logger.error).toHaveBeenCalledWith({ error: cause }, 'User lookup failed during login');
            expect(mockDb.sessions.started).toBe(mockDb.sessions.ended);
        });
    });

    // ============================================================================
    // findAll
    // ============================================================================

    describe('findAll', () => {
        it('should return an empty list when there are no accounts', async () => {
            await expect(service.findAll()).resolves.toEqual([]);
        });

        it('should return every account', async () => {
            await service.add(createInput({ username: 'alice' }));
            await service.add(createInput({ username: 'bob' }));

            const users = await service.findAll();

            expect(users.map(user => user.username).sort()).toEqual(['alice', 'bob']);
        });

        it('should wrap store faults in QueryError', async () => {
            const cause = new Error('cursor killed');
            mockDb.injectError(USER_COLLECTION, 'find', cause);

            const error = await service.findAll().catch(e => e);

            expect(error).toBeInstanceOf(QueryError);
            expect(error.message).toBe('Error in FindAll');
            expect(error.details).toEqual({ cause });
            expect(mockDb.sessions).toEqual({ started: 1, ended: 1 });
        });
    });

    // ============================================================================
    // delete
    // ============================================================================

    describe('delete', () => {
        it('should remove the account matching id and username', async () => {
            const created = await service.add(createInput());

            await service.delete({ id: created.id, username: 'alice' });

            expect(mockDb.getCollectionData(USER_COLLECTION)).toHaveLength(0);
            await expect(service.getById(created.id)).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should leave the account when the username does not match', async () => {
            const created = await service.add(createInput());

            await expect(service.delete({ id: created.id, username: 'bob' })).resolves.toBeUndefined();

            expect(mockDb.getCollectionData(USER_COLLECTION)).toHaveLength(1);
        });

        it('should keep leaving the account on a repeated mismatched delete', async () => {
            const created = await service.add(createInput());

            await service.delete({ id: created.id, username: 'bob' });
            expect(mockDb.getCollectionData(USER_COLLECTION)).toHaveLength(1);

            await expect(service.delete({ id: created.id, username: 'bob' })).resolves.toBeUndefined();
            expect(mockDb.getCollectionData(USER_COLLECTION)).toHaveLength(1);
            await expect(service.getById(created.id)).resolves.toEqual(created);
        });

        it('should wrap store faults in NotPersistedError', async () => {
            const created = await service.add(createInput());
            const cause = new Error('not primary');
            mockDb.injectError(USER_COLLECTION, 'deleteOne', cause);

            const error = await service.delete({ id: created.id, username: 'alice' }).catch(e => e);

            expect(error).toBeInstanceOf(NotPersistedError);
            expect(error.message).toBe('User not deleted');
            expect(error.details).toEqual({ id: created.id, cause });
            expect(mockDb.getCollectionData(USER_COLLECTION)).toHaveLength(1);
        });

        it('should resolve for an unknown id', async () => {
            await expect(
                service.delete({ id: new ObjectId().toHexString(), username: 'alice' })
            ).resolves.toBeUndefined();
        });

        it('should resolve without opening a session for a malformed id', async () => {
            await expect(service.delete({ id: 'bogus', username: 'alice' })).resolves.toBeUndefined();

            expect(mockDb.sessions.started).toBe(0);
        });
    });

    // ============================================================================
    // update
    // ============================================================================

    describe('update', () => {
        it('should overwrite profile fields and keep the credential when no password is given', async () => {
            const created = await service.add(createInput());

            await service.update(created.id, {
                username: 'alice2',
                email: 'alice2@example.com',
                firstname: 'Alicia',
                lastname: 'Durand'
            });

            const user = await service.getById(created.id);
            expect(user).toEqual({
                ...created,
                username: 'alice2',
                email: 'alice2@example.com',
                firstname: 'Alicia',
                lastname: 'Durand'
            });
        });

        it('should keep the credential when the password is an empty string', async () => {
            const created = await service.add(createInput());

            await service.update(created.id, {
                username: 'alice',
                password: '',
                email: 'alice@example.com',
                firstname: 'Alice',
                lastname: 'Martin'
            });

            const user = await service.getById(created.id);
            expect(user.password).toBe(created.password);
            expect(user.salt).toBe(created.salt);
        });

        it('should replace hash and salt when a new password is given', async () => {
            const created = await service.add(createInput());

            await service.update(created.id, {
                username: 'alice',
                password: 'new-test-password',
                email: 'alice@example.com',
                firstname: 'Alice',
                lastname: 'Martin'
            });

            const user = await service.getById(created.id);
            expect(user.password).toMatch(HEX_64);
            expect(user.password).not.toBe(created.password);
            expect(user.salt).not.toBe(created.salt);

            await expect(service.get('alice', 'new-test-password')).resolves.toEqual(user);
            await expect(service.get('alice', 'test-password')).rejects.toBeInstanceOf(InvalidCredentialsError);
        });

        it('should throw InvalidIdError for a malformed id', async () => {
            await expect(
                service.update('123', {
                    username: 'alice',
                    email: 'alice@example.com',
                    firstname: 'Alice',
                    lastname: 'Martin'
                })
            ).rejects.toBeInstanceOf(InvalidIdError);
            expect(mockDb.sessions.started).toBe(0);
        });

        it('should throw NotFoundError when no account matches', async () => {
            const id = new ObjectId().toHexString();

            const error = await service
                .update(id, {
                    username: 'alice',
                    email: 'alice@example.com',
                    firstname: 'Alice',
                    lastname: 'Martin'
                })
                .catch(e => e);

            expect(error).toBeInstanceOf(NotFoundError);
            expect(error.details).toEqual({ id });
            expect(mockDb.sessions).toEqual({ started: 1, ended: 1 });
        });

        it('should throw SaltGenerationError without opening a session when no salt is produced', async () => {
            const created = await service.add(createInput());
            const sessionsBefore = mockDb.sessions.started;
            vi.spyOn(passwordService, 'generateSalt').mockRejectedValue(new Error('entropy unavailable'));

            const error = await service
                .update(created.id, {
                    username: 'alice',
                    password: 'new-test-password',
                    email: 'alice@example.com',
                    firstname: 'Alice',
                    lastname: 'Martin'
                })
                .catch(e => e);

            expect(error).toBeInstanceOf(SaltGenerationError);
            expect(mockDb.sessions.started).toBe(sessionsBefore);
            await expect(service.getById(created.id)).resolves.toEqual(created);
        });

        it('should throw HashError without opening a session when hashing fails', async () => {
            const created = await service.add(createInput());
            const sessionsBefore = mockDb.sessions.started;
            vi.spyOn(passwordService, 'hashPassword').mockRejectedValue(new Error('out of memory'));

            const error = await service
                .update(created.id, {
                    username: 'alice',
                    password: 'new-test-password',
                    email: 'alice@example.com',
                    firstname: 'Alice',
                    lastname: 'Martin'
                })
                .catch(e => e);

            expect(error).toBeInstanceOf(HashError);
            expect(error.message).toBe('Error when hashing password');
            expect(mockDb.sessions.started).toBe(sessionsBefore);
        });

        it('should wrap a rejected write in NotPersistedError', async () => {
            const created = await service.add(createInput());
            const cause = new Error('E11000 duplicate key error collection: user index: username_1');
            mockDb.injectError(USER_COLLECTION, 'updateOne', cause);

            const error = await service
                .update(created.id, {
                    username: 'bob',
                    email: 'alice@example.com',
                    firstname: 'Alice',
                    lastname: 'Martin'
                })
                .catch(e => e);

            expect(error).toBeInstanceOf(NotPersistedError);
            expect(error.code).toBe('NOT_PERSISTED');
            expect(error.message).toBe('User not updated');
            expect(error.details).toEqual({ id: created.id, cause });
            expect(mockDb.sessions.started).toBe(mockDb.sessions.ended);
        });
    });

    // ============================================================================
    // resolveReference
    // ============================================================================

    describe('resolveReference', () => {
        it('should load the referenced account', async () => {
            const created = await service.add(createInput());

            const user = await service.resolveReference({ collection: 'user', id: created.id });

            expect(user).toEqual(created);
        });

        it('should throw ValidationError for a reference into another collection', async () => {
            const reference = { collection: 'article', id: new ObjectId().toHexString() } as unknown as IEntityReference;

            const error = await service.resolveReference(reference).catch(e => e);

            expect(error).toBeInstanceOf(ValidationError);
            expect(error.details).toEqual({ reference });
            expect(mockDb.sessions.started).toBe(0);
        });
    });
});
