export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type Verbosity = 'basic' | 'enhanced';

export type QueryValue = string | number | boolean;

export type QueryInput = QueryValue | readonly QueryValue[] | null | undefined;

export type QueryParams = Record<string, QueryValue>;

export type HeaderMap = Record<string, string[]>;

export type ResourceId = number | string;

export type UploadFile = {
  field: 'file';
  path: string;
};

export type RequestSpec = {
  method: HttpMethod;
  path: string;
  query: QueryParams;
  file?: UploadFile;
  responseType?: 'json' | 'text';
};

export type TransportRequestOptions = Omit<RequestSpec, 'method' | 'path'>;

export type TransportResponse = {
  status: number;
  headers: HeaderMap;
  body: string;
};

export type ResponseBody = JsonValue | null;

export type ResponseEnvelope = {
  headers: HeaderMap;
  body: ResponseBody;
  success: boolean;
  status: number;
};

/** GPX or TCX document returned verbatim by the route export endpoints. */
export type ExportDocument = string;

export type ShapedResponse = ResponseEnvelope | ExportDocument;

export type VerbosityResult = {
  basic: ResponseBody;
  enhanced: ShapedResponse;
};

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type Paging = {
  page?: number;
  perPage?: number;
};

export type AthleteRoutesOptions = Paging & {
  type?: string;
  after?: number;
};

export type AthleteActivitiesOptions = Paging & {
  before?: string | number;
  after?: string | number;
};

export type AthleteUpdate = {
  city?: string;
  state?: string;
  country?: string;
  sex?: 'M' | 'F';
  weight?: number;
};

export type ActivityOptions = {
  includeAllEfforts?: boolean;
};

export type ActivityCommentsOptions = Paging & {
  markdown?: boolean;
};

export type ActivityPhotosOptions = {
  size?: number;
  photoSources?: string;
};

export type CreateActivityInput = {
  name: string;
  type: string;
  startDateLocal: string;
  elapsedTime: number;
  description?: string;
  distance?: number;
  private?: boolean;
  trainer?: boolean;
};

export type UploadActivityOptions = {
  activityType?: string;
  name?: string;
  description?: string;
  private?: boolean;
  trainer?: boolean;
  commute?: boolean;
  dataType?: 'fit' | 'fit.gz' | 'tcx' | 'tcx.gz' | 'gpx' | 'gpx.gz';
  externalId?: string;
};

export type UpdateActivityOptions = {
  name?: string;
  type?: string;
  private?: boolean;
  commute?: boolean;
  trainer?: boolean;
  gearId?: string;
  description?: string;
};

export type SegmentLeaderboardOptions = Paging & {
  gender?: 'M' | 'F';
  ageGroup?: string;
  weightClass?: string;
  following?: boolean;
  clubId?: number;
  dateRange?: 'this_year' | 'this_month' | 'this_week' | 'today';
  contextEntries?: number;
};

export type SegmentBounds = string | readonly [number, number, number, number];

export type SegmentExplorerOptions = {
  activityType?: 'running' | 'riding';
  minCat?: number;
  maxCat?: number;
};

export type SegmentEffortsOptions = Paging & {
  athleteId?: number;
  startDateLocal?: string;
  endDateLocal?: string;
};

export type StreamTypes = string | readonly string[];

export type StreamOptions = {
  resolution?: 'low' | 'medium' | 'high';
  seriesType?: 'distance' | 'time';
};
