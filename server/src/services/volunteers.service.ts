import { fail, ok, type Result } from '../domain/errors';
import { evaluate } from '../domain/permissions';
import { isResponderRole, type PresenceStatus, type ResponderRole, type VolunteerProfile } from '../domain/types';
import { resolveActor, resolveDeps, type ServiceDeps } from './context';

export type CreateVolunteerProfileInput = {
  specialties: string[];
  availability: string;
  experience: string;
  /** Defaults to the user's full name. */
  name?: string;
  /** Defaults to the user's location. */
  location?: string;
};

export type UpdateVolunteerProfileInput = Partial<CreateVolunteerProfileInput>;

export type VolunteerProfileFilter = {
  role?: ResponderRole;
  userStatus?: PresenceStatus;
};

function cleanTags(tags: string[]): string[] {
  return [...new Set(tags.map((tag) => tag.trim()).filter(Boolean))];
}

export function createVolunteersService(deps: ServiceDeps) {
  const { gateway, now } = resolveDeps(deps);

  async function createVolunteerProfile(
    actorId: string,
    input: CreateVolunteerProfileInput
  ): Promise<Result<VolunteerProfile>> {
    const actor = await resolveActor(gateway, actorId);
    if (!actor.ok) return actor;
    if (evaluate(actor.value, 'create', { kind: 'volunteerProfile', ownerId: actorId }) === 'deny') {
      return fail('Denied', 'Sign in to create a volunteer profile');
    }

    const user = await gateway.get('users', actorId);
    if (!user.ok) return user;
    const role = user.value.role;
    if (!isResponderRole(role)) {
      return fail('Invalid', 'Only volunteers and first responders can have a volunteer profile');
    }

    const profile: VolunteerProfile = {
      id: actorId,
      email: user.value.email,
      name: input.name?.trim() || user.value.fullName,
      role,
      location: input.location?.trim() || user.value.location,
      specialties: cleanTags(input.specialties),
      availability: input.availability.trim(),
      experience: input.experience.trim(),
      userStatus: user.value.userStatus,
      createdAt: now(),
      version: 0
    };
    const created = await gateway.create('volunteers', profile);
    return created.ok ? ok(profile) : created;
  }

  async function getVolunteerProfile(profileId: string): Promise<Result<VolunteerProfile>> {
    return gateway.get('volunteers', profileId);
  }

  async function listVolunteerProfiles(filter: VolunteerProfileFilter = {}): Promise<Result<VolunteerProfile[]>> {
    const found = filter.role
      ? await gateway.queryByField('volunteers', 'role', filter.role)
      : await gateway.list('volunteers');
    if (!found.ok) return found;
    return ok(
      filter.userStatus ? found.value.filter((profile) => profile.userStatus === filter.userStatus) : found.value
    );
  }

  async function updateVolunteerProfile(
    actorId: string,
    profileId: string,
    input: UpdateVolunteerProfileInput
  ): Promise<Result<VolunteerProfile>> {
    const actor = await resolveActor(gateway, actorId);
    if (!actor.ok) return actor;
    if (evaluate(actor.value, 'update', { kind: 'volunteerProfile', ownerId: profileId }) === 'deny') {
      return fail('Denied', 'Only the owner or a first responder can edit this profile');
    }

    const current = await gateway.get('volunteers', profileId);
    if (!current.ok) return current;

    const patch: Partial<Omit<VolunteerProfile, 'id' | 'version'>> = {};
    if (input.name !== undefined) patch.name = input.name.trim();
    if (input.location !== undefined) patch.location = input.location.trim();
    if (input.specialties !== undefined) patch.specialties = cleanTags(input.specialties);
    if (input.availability !== undefined) patch.availability = input.availability.trim();
    if (input.experience !== undefined) patch.experience = input.experience.trim();
    return gateway.updateIfMatch('volunteers', profileId, current.value.version, patch);
  }

  return { createVolunteerProfile, getVolunteerProfile, listVolunteerProfiles, updateVolunteerProfile };
}

export type VolunteersService = ReturnType<typeof createVolunteersService>;
