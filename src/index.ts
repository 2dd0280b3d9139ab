export { WebDAVClient } from './services/WebDAVClient';
export type { SyncCollectionOptions, WebDAVClientOptions } from './services/WebDAVClient';
export { RequestDispatcher, headersToRecord } from './services/RequestDispatcher';
export type { DispatchOutcome, DispatchRequest, RequestBody, SuccessOutcome } from './services/RequestDispatcher';
export { StreamingTransferManager } from './services/StreamingTransferManager';
export type { ByteSource, DownloadOptions, ProgressListener, UploadOptions } from './services/StreamingTransferManager';
export { DEFAULT_LOCK_OWNER, DEFAULT_LOCK_TIMEOUT, ifHeader, LockVersionManager } from './services/LockVersionManager';
export { VersioningService } from './services/VersioningService';
export { AccessControlService } from './services/AccessControlService';

export { AuthenticationNegotiator, WORKSTATION_HEADER } from './auth/AuthenticationNegotiator';
export type { AuthState } from './auth/AuthenticationNegotiator';
export { BasicAuthHandler, DomainBasicAuthHandler, basicAuthorization, parseChallengeSchemes, qualifiedUsername } from './auth/AuthHandler';
export type { AuthHandler, BasicCredentials, ChallengeHeaders } from './auth/AuthHandler';

export { CLIENT_VERSION, createConfig, loadConfigFromEnv } from './config';
export type { ClientConfig, ClientConfigOverrides } from './config';
export {
    AppError,
    AuthenticationError,
    formatErrorMessage,
    MalformedResponseError,
    NetworkError,
    ProtocolError,
    WebDAVError,
} from './errorHandler';

export { DavResource } from './models/DavResource';
export { DavAce, DavAcl, SPECIAL_PRINCIPALS } from './models/DavAce';
export { DavPrincipal } from './models/DavPrincipal';
export type { PrincipalType } from './models/DavPrincipal';
export { DavQuota } from './models/DavQuota';
export type { Activelock, LockOptions, LockScope } from './models/lock';
export type { DavProperty, DavResponse, DavStatus, Multistatus, Propstat, SyncResult } from './models/multistatus';
export type { WebDAVReport } from './models/WebDAVReport';

export { parseMultistatus, parseMultistatusResources, successfulProperties, toResource, toResources } from './xml/multistatusParser';
export { parseXml } from './xml/xmlNode';
export type { XmlNode } from './xml/xmlNode';
export * from './util/davUtils';
export { getMimeType } from './util/mimeTypes';
