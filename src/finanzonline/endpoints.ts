import { DEFAULT_FO_BASE_URL } from '../core/config.js';

export interface ServiceEndpoint {
  url: string;
  namespace: string;
}

export interface FinanzOnlineEndpoints {
  session: ServiceEndpoint;
  databox: ServiceEndpoint;
  upload: ServiceEndpoint;
  uid: ServiceEndpoint;
}

// Namespaces are part of the protocol and do not follow a base-URL override.
export const SESSION_NS = 'https://finanzonline.bmf.gv.at/fonws/ws/sessionService';
export const DATABOX_NS = 'https://finanzonline.bmf.gv.at/fonws/ws/databoxService';
export const UPLOAD_NS  = 'https://finanzonline.bmf.gv.at/fonws/ws/fileUploadService';
export const UID_NS     = 'http://finanzonline.bmf.gv.at/fonuid';

export function finanzOnlineEndpoints(baseUrl = DEFAULT_FO_BASE_URL): FinanzOnlineEndpoints {
  const base = baseUrl.replace(/\/+$/, '');
  return {
    session: { url: `${base}/sessionService`,    namespace: SESSION_NS },
    databox: { url: `${base}/databoxService`,    namespace: DATABOX_NS },
    upload:  { url: `${base}/fileUploadService`, namespace: UPLOAD_NS },
    uid:     { url: `${base}/uidAbfrageService`, namespace: UID_NS },
  };
}
