export { getZendeskConfig, createSession, zendeskFetch, verifyCredentials, backoffDelay, authHeader, type ZendeskClientConfig, type ZendeskSession, type SessionOptions } from "./client";
export { fetchTickets, mapTicket, buildTicketSearchPath, countByStatus, type Ticket } from "./tickets";
export { fetchComments, fetchAllComments, mapComment, indexByTicket, type Comment, type CommentFetchResult } from "./comments";
export { fetchUsersByIds, mapUser, MAX_IDS_PER_REQUEST, type UserIdentity } from "./users";
