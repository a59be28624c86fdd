import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export type StubReply = { status: number; data: unknown } | { networkError: string };

/**
 * Replaces the transport of an axios instance with an in-process responder.
 * Non-2xx replies reject with AxiosError, as the real adapters do.
 */
export function stubTransport(
  http: AxiosInstance,
  respond: (config: InternalAxiosRequestConfig) => StubReply,
): InternalAxiosRequestConfig[] {
  const requests: InternalAxiosRequestConfig[] = [];

  http.defaults.adapter = (config: InternalAxiosRequestConfig) => {
    requests.push(config);
    const reply = respond(config);

    if ('networkError' in reply) {
      return Promise.reject(new AxiosError(reply.networkError, 'ECONNREFUSED', config));
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };

    if (reply.status < 200 || reply.status >= 300) {
      return Promise.reject(
        new AxiosError(
          `Request failed with status code ${reply.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response,
        ),
      );
    }

    return Promise.resolve(response);
  };

  return requests;
}

export function plainAxios(): AxiosInstance {
  return axios.create();
}
