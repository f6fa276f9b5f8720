/**
 * Profile editor
 *
 * Field-by-field optimistic edits of the signed-in user's profile.
 * Edits of different fields may run side by side; a second edit of a
 * field whose first edit is still pending is rejected.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import {
    MutationCoordinator,
    PageLoader,
    createLogSink,
    createLogger,
    findItem,
    invalid,
    noop,
    proceed,
    type Clock,
    type CoordinatorConfigInput,
    type EventSink,
    type LoadResult,
    type LoadingState,
    type MutationDefinition,
    type MutationFailure,
    type MutationOutcome,
    type StoreListener,
    type UpdateId,
} from '../engine';

export interface Profile {
    readonly id: string;
    readonly displayName: string;
    readonly bio: string;
    readonly location: string;
}

export type ProfileField = 'displayName' | 'bio' | 'location';

export const profileFieldSchemas = {
    displayName: z.string().min(1, 'Display name is required').max(50, 'Display name must be at most 50 characters'),
    bio: z.string().max(300, 'Bio must be at most 300 characters'),
    location: z.string().max(100, 'Location must be at most 100 characters'),
} satisfies Record<ProfileField, z.ZodType<string>>;

export interface ProfileRepository {
    fetchProfile(userId: string, signal: AbortSignal): Promise<Profile>;
    /** Returns the whole profile as stored after the change */
    updateProfileField(userId: string, field: ProfileField, value: string, signal: AbortSignal): Promise<Profile>;
}

export type ProfileEditorOptions = {
    userId: string;
    repository: ProfileRepository;
    config?: CoordinatorConfigInput;
    clock?: Clock;
    sink?: EventSink;
    /** Parent of the feature's logger when no sink is given */
    logger?: Logger;
};

export type FieldEdit = {
    field: ProfileField;
    value: string;
};

export function updateFieldMutation(
    repository: ProfileRepository,
    userId: string,
): MutationDefinition<Profile, FieldEdit, Profile> {
    return {
        entityType: 'profile-field',
        operation: 'update',
        entityId: () => userId,
        fields: (edit) => [edit.field],
        precondition: (state, edit) => {
            const profile = findItem(state.items, userId);
            if (!profile) {
                return invalid('Profile is not loaded');
            }
            if (profile[edit.field] === edit.value) {
                return noop;
            }
            const parsed = profileFieldSchemas[edit.field].safeParse(edit.value);
            return parsed.success ? proceed : invalid(parsed.error.issues[0]?.message ?? 'Invalid value');
        },
        apply: (draft, edit) => {
            const profile = draft.items.find((item) => item.id === userId);
            if (profile) {
                profile[edit.field] = edit.value;
            }
        },
        confirm: (draft, _edit, result) => {
            const index = draft.items.findIndex((item) => item.id === userId);
            if (index >= 0) {
                draft.items[index] = result;
            }
        },
        execute: (edit, signal) => repository.updateProfileField(userId, edit.field, edit.value, signal),
    };
}

export class ProfileEditor {
    readonly userId: string;
    private readonly coordinator: MutationCoordinator<Profile>;
    private readonly loader: PageLoader<Profile>;
    private readonly updateDefinition: MutationDefinition<Profile, FieldEdit, Profile>;

    constructor(options: ProfileEditorOptions) {
        const sink = options.sink ?? createLogSink(createLogger('profile', options.logger));

        this.userId = options.userId;
        this.coordinator = new MutationCoordinator<Profile>({
            collection: 'profile',
            config: options.config,
            clock: options.clock,
            sink,
        });
        this.loader = new PageLoader<Profile>({
            store: this.coordinator.store,
            fetchPage: async ({ signal }) => ({
                items: [await options.repository.fetchProfile(options.userId, signal)],
                offset: 0,
                nextOffset: null,
            }),
            policy: this.coordinator.policy,
            clock: options.clock,
            sink,
        });
        this.updateDefinition = updateFieldMutation(options.repository, options.userId);
    }

    /**
     * Visible profile, null until loaded
     */
    get profile(): Profile | null {
        return findItem(this.coordinator.state.items, this.userId);
    }

    get loadingState(): LoadingState {
        return this.coordinator.state.loadingState;
    }

    subscribe(listener: StoreListener<Profile>): () => void {
        return this.coordinator.store.subscribe(listener);
    }

    onFailure(listener: (failure: MutationFailure) => void): () => void {
        return this.coordinator.onFailure(listener);
    }

    load(): Promise<LoadResult> {
        return this.loader.refresh();
    }

    updateField(field: ProfileField, value: string): Promise<MutationOutcome<Profile>> {
        return this.coordinator.mutate(this.updateDefinition, { field, value });
    }

    /**
     * Drop an edit the server refused
     */
    discardFailed(updateId: UpdateId): boolean {
        return this.coordinator.revert(updateId);
    }

    dispose(): void {
        this.loader.cancel();
        this.coordinator.dispose();
    }
}
