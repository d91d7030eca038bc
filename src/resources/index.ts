import { sessionResource, sessionSummaryResource, sessionsListResource } from "./sessions.ts";

export { sessionResource, sessionSummaryResource, sessionsListResource };
