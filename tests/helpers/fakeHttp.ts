import axios, { type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";

export interface FakeRoute {
  status?: number;
  data: unknown;
  /** Milliseconds before the response arrives. */
  delayMs?: number;
  /** Fails the request at the transport level instead of answering. */
  networkError?: boolean;
}

export interface FakeHttp {
  http: AxiosInstance;
  /** Requested URLs in order. */
  calls: string[];
}

/** Axios instance whose adapter answers from `routes` in process; unknown URLs get a 404. */
export function fakeHttp(routes: Record<string, FakeRoute>): FakeHttp {
  const calls: string[] = [];
  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const url = config.url ?? "";
    calls.push(url);
    const route = routes[url];
    if (route?.delayMs) await new Promise((resolve) => setTimeout(resolve, route.delayMs));
    if (route?.networkError) throw new axios.AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
    return {
      data: route ? route.data : "not found",
      status: route?.status ?? (route ? 200 : 404),
      statusText: "",
      headers: {},
      config
    };
  };
  return { http: axios.create({ adapter, validateStatus: () => true }), calls };
}
