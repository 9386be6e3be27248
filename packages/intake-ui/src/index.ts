export { TriageApiClient, TriageApiClientOptions, TriageApiError, classificationResultSchema } from './api-client';
export { createIntakeApp, IntakeAppDeps, showFormHandler, submitFormHandler } from './app';
export { renderIntakePage, escapeHtml, IntakePageState } from './pages';
