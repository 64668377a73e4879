import { baseLogger, type Logger } from '../../observability/logger';
import { ServiceError } from './errors';
import { buildQuery, joinList } from './query';
import { shapeResponse } from './response-shaper';
import { resolveAccessToken, type AccessTokenInput } from './token';
import type { StravaTransport } from './transport';
import type {
  ActivityCommentsOptions,
  ActivityOptions,
  ActivityPhotosOptions,
  AthleteActivitiesOptions,
  AthleteRoutesOptions,
  AthleteUpdate,
  CreateActivityInput,
  HttpMethod,
  Paging,
  QueryInput,
  RequestSpec,
  ResourceId,
  Result,
  SegmentBounds,
  SegmentEffortsOptions,
  SegmentExplorerOptions,
  SegmentLeaderboardOptions,
  ShapedResponse,
  StreamOptions,
  StreamTypes,
  UpdateActivityOptions,
  UploadActivityOptions,
  Verbosity,
  VerbosityResult
} from './types';

type VerbosityPolicies = {
  [K in Verbosity]: (response: ShapedResponse) => VerbosityResult[K];
};

const verbosityPolicies: VerbosityPolicies = {
  basic: (response) => (typeof response === 'string' ? response : response.body),
  enhanced: (response) => response
};

export type StravaClientOptions = {
  logger?: Logger;
};

type CallOptions = Pick<RequestSpec, 'file' | 'responseType'>;

const segment = (id: ResourceId): string => encodeURIComponent(String(id));

const streamKeys = (types: StreamTypes): string => {
  const keys: readonly string[] = typeof types === 'string' ? types.split(',') : types;
  return keys.map((key) => encodeURIComponent(key.trim())).join(',');
};

const paging = (options: Paging): Record<string, QueryInput> => ({
  page: options.page,
  per_page: options.perPage
});

/**
 * Client for the Strava v3 REST API. Each operation maps onto one endpoint;
 * the verbosity chosen at construction decides whether callers get the decoded
 * body or the full response envelope.
 */
export class StravaApiClient<V extends Verbosity> {
  private readonly token: string;
  private readonly present: (response: ShapedResponse) => VerbosityResult[V];
  private readonly logger: Logger;

  constructor(
    token: AccessTokenInput,
    private readonly transport: StravaTransport,
    readonly verbosity: V,
    options: StravaClientOptions = {}
  ) {
    if (!transport) {
      throw new ServiceError('An HTTP transport is required');
    }

    const present = verbosityPolicies[verbosity];
    if (!present) {
      throw new ServiceError(`Unknown response verbosity: ${String(verbosity)}`);
    }

    this.token = resolveAccessToken(token);
    this.present = present;
    this.logger = (options.logger ?? baseLogger).with({ component: 'strava-api-client' });
  }

  getAthlete(id?: ResourceId): Promise<VerbosityResult[V]> {
    const path = id === undefined ? 'athlete' : `athletes/${segment(id)}`;
    return this.call('GET', path);
  }

  getAthleteStats(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `athletes/${segment(id)}/stats`);
  }

  getAthleteRoutes(id: ResourceId, options: AthleteRoutesOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `athletes/${segment(id)}/routes`, {
      type: options.type,
      after: options.after,
      ...paging(options)
    });
  }

  getAthleteClubs(): Promise<VerbosityResult[V]> {
    return this.call('GET', 'athlete/clubs');
  }

  getAthleteActivities(options: AthleteActivitiesOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', 'athlete/activities', {
      before: options.before,
      after: options.after,
      ...paging(options)
    });
  }

  getAthleteFriends(id?: ResourceId, options: Paging = {}): Promise<VerbosityResult[V]> {
    const path = id === undefined ? 'athlete/friends' : `athletes/${segment(id)}/friends`;
    return this.call('GET', path, paging(options));
  }

  getAthleteFollowers(id?: ResourceId, options: Paging = {}): Promise<VerbosityResult[V]> {
    const path = id === undefined ? 'athlete/followers' : `athletes/${segment(id)}/followers`;
    return this.call('GET', path, paging(options));
  }

  getAthleteBothFollowing(id: ResourceId, options: Paging = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `athletes/${segment(id)}/both-following`, paging(options));
  }

  getAthleteKoms(id: ResourceId, options: Paging = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `athletes/${segment(id)}/koms`, paging(options));
  }

  getAthleteZones(): Promise<VerbosityResult[V]> {
    return this.call('GET', 'athlete/zones');
  }

  getAthleteStarredSegments(id?: ResourceId, options: Paging = {}): Promise<VerbosityResult[V]> {
    // The published docs list a different path for other athletes; this one is what the API serves.
    const path = id === undefined ? 'segments/starred' : `athletes/${segment(id)}/segments/starred`;
    return this.call('GET', path, paging(options));
  }

  updateAthlete(update: AthleteUpdate): Promise<VerbosityResult[V]> {
    return this.call('PUT', 'athlete', {
      city: update.city,
      state: update.state,
      country: update.country,
      sex: update.sex,
      weight: update.weight
    });
  }

  getActivity(id: ResourceId, options: ActivityOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `activities/${segment(id)}`, {
      include_all_efforts: options.includeAllEfforts
    });
  }

  getActivityComments(id: ResourceId, options: ActivityCommentsOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `activities/${segment(id)}/comments`, {
      markdown: options.markdown,
      ...paging(options)
    });
  }

  getActivityKudos(id: ResourceId, options: Paging = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `activities/${segment(id)}/kudos`, paging(options));
  }

  getActivityPhotos(id: ResourceId, options: ActivityPhotosOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `activities/${segment(id)}/photos`, {
      size: options.size ?? 2048,
      photo_sources: options.photoSources ?? 'true'
    });
  }

  getActivityZones(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `activities/${segment(id)}/zones`);
  }

  getActivityLaps(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `activities/${segment(id)}/laps`);
  }

  getActivityUploadStatus(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `uploads/${segment(id)}`);
  }

  createActivity(input: CreateActivityInput): Promise<VerbosityResult[V]> {
    return this.call('POST', 'activities', {
      name: input.name,
      type: input.type,
      start_date_local: input.startDateLocal,
      elapsed_time: input.elapsedTime,
      description: input.description,
      distance: input.distance,
      private: input.private,
      trainer: input.trainer
    });
  }

  uploadActivity(file: string, options: UploadActivityOptions = {}): Promise<VerbosityResult[V]> {
    return this.call(
      'POST',
      'uploads',
      {
        activity_type: options.activityType,
        name: options.name,
        description: options.description,
        private: options.private,
        trainer: options.trainer,
        commute: options.commute,
        data_type: options.dataType,
        external_id: options.externalId
      },
      { file: { field: 'file', path: file } }
    );
  }

  updateActivity(id: ResourceId, options: UpdateActivityOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('PUT', `activities/${segment(id)}`, {
      name: options.name,
      type: options.type,
      private: options.private ?? false,
      commute: options.commute ?? false,
      trainer: options.trainer ?? false,
      gear_id: options.gearId,
      description: options.description
    });
  }

  deleteActivity(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('DELETE', `activities/${segment(id)}`);
  }

  getGear(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `gear/${segment(id)}`);
  }

  getClub(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `clubs/${segment(id)}`);
  }

  getClubMembers(id: ResourceId, options: Paging = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `clubs/${segment(id)}/members`, paging(options));
  }

  getClubActivities(id: ResourceId, options: Paging = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `clubs/${segment(id)}/activities`, paging(options));
  }

  getClubAnnouncements(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `clubs/${segment(id)}/announcements`);
  }

  getClubGroupEvents(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `clubs/${segment(id)}/group_events`);
  }

  joinClub(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('POST', `clubs/${segment(id)}/join`);
  }

  leaveClub(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('POST', `clubs/${segment(id)}/leave`);
  }

  getRoute(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `routes/${segment(id)}`);
  }

  exportAsGPX(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `routes/${segment(id)}/export_gpx`, {}, { responseType: 'text' });
  }

  exportAsTCX(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `routes/${segment(id)}/export_tcx`, {}, { responseType: 'text' });
  }

  getSegment(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `segments/${segment(id)}`);
  }

  getSegmentLeaderboard(id: ResourceId, options: SegmentLeaderboardOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `segments/${segment(id)}/leaderboard`, {
      gender: options.gender,
      age_group: options.ageGroup,
      weight_class: options.weightClass,
      following: options.following,
      club_id: options.clubId,
      date_range: options.dateRange,
      context_entries: options.contextEntries,
      ...paging(options)
    });
  }

  getSegmentExplorer(bounds: SegmentBounds, options: SegmentExplorerOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', 'segments/explore', {
      bounds: joinList(bounds),
      activity_type: options.activityType ?? 'riding',
      min_cat: options.minCat,
      max_cat: options.maxCat
    });
  }

  getSegmentEfforts(id: ResourceId, options: SegmentEffortsOptions = {}): Promise<VerbosityResult[V]> {
    return this.call('GET', `segments/${segment(id)}/all_efforts`, {
      athlete_id: options.athleteId,
      start_date_local: options.startDateLocal,
      end_date_local: options.endDateLocal,
      ...paging(options)
    });
  }

  getStreamsActivity(id: ResourceId, types: StreamTypes, options: StreamOptions = {}): Promise<VerbosityResult[V]> {
    return this.streams(`activities/${segment(id)}`, types, options);
  }

  getStreamsEffort(id: ResourceId, types: StreamTypes, options: StreamOptions = {}): Promise<VerbosityResult[V]> {
    return this.streams(`segment_efforts/${segment(id)}`, types, options);
  }

  getStreamsSegment(id: ResourceId, types: StreamTypes, options: StreamOptions = {}): Promise<VerbosityResult[V]> {
    return this.streams(`segments/${segment(id)}`, types, options);
  }

  getStreamsRoute(id: ResourceId): Promise<VerbosityResult[V]> {
    return this.call('GET', `routes/${segment(id)}/streams`);
  }

  private streams(resource: string, types: StreamTypes, options: StreamOptions): Promise<VerbosityResult[V]> {
    return this.call('GET', `${resource}/streams/${streamKeys(types)}`, {
      resolution: options.resolution,
      series_type: options.seriesType ?? 'distance'
    });
  }

  private async call(
    method: HttpMethod,
    path: string,
    params: Record<string, QueryInput> = {},
    options: CallOptions = {}
  ): Promise<VerbosityResult[V]> {
    const result = await this.execute({
      method,
      path,
      query: buildQuery(params, this.token),
      ...options
    });

    if (!result.ok) {
      throw result.error;
    }

    return this.present(result.value);
  }

  private async execute(spec: RequestSpec): Promise<Result<ShapedResponse, ServiceError>> {
    const { method, path, ...requestOptions } = spec;
    this.logger.debug('Strava request', {
      method,
      path,
      params: Object.keys(spec.query).filter((key) => key !== 'access_token'),
      upload: Boolean(spec.file)
    });

    try {
      const response = await this.transport.request(method, path, requestOptions);
      return { ok: true, value: shapeResponse(response) };
    } catch (error) {
      const serviceError = ServiceError.fromUnknown(error);
      this.logger.warn('Strava request failed', { method, path, message: serviceError.message });
      return { ok: false, error: serviceError };
    }
  }
}

export function createStravaClient(
  token: AccessTokenInput,
  transport: StravaTransport
): StravaApiClient<'basic'>;
export function createStravaClient<V extends Verbosity>(
  token: AccessTokenInput,
  transport: StravaTransport,
  verbosity: V,
  options?: StravaClientOptions
): StravaApiClient<V>;
export function createStravaClient(
  token: AccessTokenInput,
  transport: StravaTransport,
  verbosity: Verbosity = 'basic',
  options: StravaClientOptions = {}
): StravaApiClient<Verbosity> {
  return new StravaApiClient(token, transport, verbosity, options);
}
