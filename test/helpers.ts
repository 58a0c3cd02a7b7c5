import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import { createAxiosTransport, type Transport } from "../src/client/transport.js";
import type { DocumentNode, ElementNode, TextNode, XmlDocument } from "../src/types/internal.js";

export function el(
  tagName: string,
  attributes: Record<string, string> = {},
  ...children: DocumentNode[]
): ElementNode {
  return { kind: "element", tagName, attributes, children };
}

export function text(value: string): TextNode {
  return { kind: "text", value };
}

export function doc(root: ElementNode): XmlDocument {
  return { children: [root] };
}

export type StubReply =
  | { status: number; body: string; statusText?: string }
  | { networkError: string };

/** axios with an in-process adapter; every request URL is recorded. */
export function stubAxios(reply: StubReply): { http: AxiosInstance; urls: string[] } {
  const urls: string[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      urls.push(config.url ?? "");
      if ("networkError" in reply) {
        throw new AxiosError(reply.networkError, "ECONNREFUSED", config);
      }
      return {
        data: reply.body,
        status: reply.status,
        statusText: reply.statusText ?? "",
        headers: {},
        config,
      };
    },
  });
  return { http, urls };
}

export function stubTransport(reply: StubReply): { transport: Transport; urls: string[] } {
  const { http, urls } = stubAxios(reply);
  return { transport: createAxiosTransport({ timeoutMs: 1000, userAgent: "test", instance: http }), urls };
}
