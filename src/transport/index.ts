export {
  type HttpTransportConfig,
  type HttpRequest,
  type HttpResponse,
  HttpTransport,
} from './http.js';

export { forwardAbort, abortableSleep, raceAbort } from './abort.js';
