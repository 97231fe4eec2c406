import axios, {
  AxiosError,
  CanceledError,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";

export interface MockReply {
  status: number;
  data?: string;
  headers?: Record<string, string>;
  /** Never answers; rejects with a cancellation once the request is aborted */
  hold?: boolean;
}

export interface AxiosMock {
  instance: AxiosInstance;
  calls: InternalAxiosRequestConfig[];
}

/**
 * Axios instance whose transport answers from `reply`. Status validation
 * follows Axios' own `settle`.
 */
export function createAxiosMock(
  reply: (config: InternalAxiosRequestConfig) => MockReply
): AxiosMock {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = (config) => {
    calls.push(config);
    const { status, data = "", headers = {}, hold } = reply(config);

    return new Promise<AxiosResponse>((resolve, reject) => {
      if (hold) {
        config.signal?.addEventListener?.("abort", () => reject(new CanceledError()));
        return;
      }

      const body = Buffer.from(data);
      config.onDownloadProgress?.({
        loaded: body.byteLength,
        total: body.byteLength,
        bytes: body.byteLength,
        lengthComputable: true,
      });

      const response: AxiosResponse = {
        data: body,
        status,
        statusText: "",
        headers,
        config,
        request: {},
      };
      if (!config.validateStatus || config.validateStatus(status)) {
        resolve(response);
        return;
      }
      reject(
        new AxiosError(
          `Request failed with status code ${status}`,
          status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
          config,
          null,
          response
        )
      );
    });
  };

  return { instance: axios.create({ adapter }), calls };
}
