import { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { createHttpClient } from '../../src/common/http.js';

/**
 * Request as seen by the fake transport
 */
export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  /** Serialized request body, when one was sent */
  data: string | undefined;
  authorization: string | undefined;
  contentType: string | undefined;
}

export type FakeReply =
  | { status: number; body?: unknown }
  | { networkError: { message: string; code: string } };

export type FakeHandler = (request: RecordedRequest) => FakeReply | Promise<FakeReply>;

/**
 * Axios instance whose requests are answered in process by `handler`.
 * Pass `http` to answer requests sent through a caller-built instance.
 */
export function createFakeHttp(
  handler: FakeHandler,
  http: AxiosInstance = createHttpClient('clickup', { baseUrl: 'https://clickup.test/api/v2' })
): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  http.defaults.adapter = async (config: InternalAxiosRequestConfig) => {
    const authorization = config.headers.get('Authorization');
    const contentType = config.headers.get('Content-Type');
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      data: typeof config.data === 'string' ? config.data : undefined,
      authorization: typeof authorization === 'string' ? authorization : undefined,
      contentType: typeof contentType === 'string' ? contentType : undefined,
    };
    requests.push(request);

    const reply = await handler(request);
    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError.message, reply.networkError.code, config);
    }

    const { body } = reply;
    return {
      data: body === undefined ? '' : typeof body === 'string' ? body : JSON.stringify(body),
      status: reply.status,
      statusText: '',
      headers: {},
      config,
    };
  };

  return { http, requests };
}

type Resource = Record<string, unknown> & { id: string; name: string };

/**
 * In-memory stand-in for the parts of the ClickUp API the client uses.
 */
export class FakeClickUp {
  private nextId = 9000;
  readonly spaces = new Map<string, Resource>();
  readonly folders = new Map<string, Resource>();
  readonly lists = new Map<string, Resource>();
  readonly tasks = new Map<string, Resource>();
  readonly comments = new Map<string, Record<string, unknown>[]>();

  readonly handler: FakeHandler = (request) => this.route(request);

  private route(request: RecordedRequest): FakeReply {
    const body: Record<string, unknown> = request.data ? JSON.parse(request.data) : {};
    const [collection, id, child] = request.url.split('/');
    const key = `${request.method} ${collection}${child ? `/:id/${child}` : id ? '/:id' : ''}`;

    switch (key) {
      case 'GET team':
        return { status: 200, body: { teams: [{ id: '1', name: 'Acme', color: '#7b68ee', avatar: null }] } };
      case 'POST team/:id/space':
        return this.create(this.spaces, { ...body, private: false, archived: false });
      case 'GET team/:id/space':
        return { status: 200, body: { spaces: [...this.spaces.values()] } };
      case 'GET space/:id':
        return this.read(this.spaces, id, 'Space');
      case 'PUT space/:id':
        return this.update(this.spaces, id, body, 'Space');
      case 'DELETE space/:id':
        return this.remove(this.spaces, id, 'Space');
      case 'POST space/:id/folder':
        return this.create(this.folders, { ...body, space: { id } });
      case 'GET space/:id/folder':
        return { status: 200, body: { folders: this.childrenOf(this.folders, 'space', id) } };
      case 'GET folder/:id':
        return this.read(this.folders, id, 'Folder');
      case 'POST folder/:id/list':
        return this.create(this.lists, { ...body, folder: { id } });
      case 'GET folder/:id/list':
        return { status: 200, body: { lists: this.childrenOf(this.lists, 'folder', id) } };
      case 'GET list/:id':
        return this.read(this.lists, id, 'List');
      case 'POST list/:id/task':
        return this.create(this.tasks, {
          ...body,
          status: { status: 'to do' },
          priority: typeof body['priority'] === 'number' ? { id: String(body['priority']) } : null,
          list: { id },
        });
      case 'GET list/:id/task':
        return { status: 200, body: { tasks: this.childrenOf(this.tasks, 'list', id), last_page: true } };
      case 'GET task/:id':
        return this.read(this.tasks, id, 'Task');
      case 'PUT task/:id':
        return this.update(this.tasks, id, body, 'Task');
      case 'DELETE task/:id':
        return this.remove(this.tasks, id, 'Task');
      case 'POST task/:id/comment':
        return this.comment(id, body);
      case 'GET task/:id/comment':
        return { status: 200, body: { comments: this.comments.get(id ?? '') ?? [] } };
      default:
        return { status: 404, body: { err: 'Route not found', ECODE: 'APP_001' } };
    }
  }

  private create(store: Map<string, Resource>, fields: Record<string, unknown>): FakeReply {
    const id = String(this.nextId++);
    const name = typeof fields['name'] === 'string' ? fields['name'] : '';
    const resource: Resource = { ...fields, id, name };
    store.set(id, resource);
    return { status: 200, body: resource };
  }

  private read(store: Map<string, Resource>, id: string | undefined, label: string): FakeReply {
    const resource = store.get(id ?? '');
    return resource ? { status: 200, body: resource } : notFound(label);
  }

  private update(
    store: Map<string, Resource>,
    id: string | undefined,
    fields: Record<string, unknown>,
    label: string
  ): FakeReply {
    const resource = store.get(id ?? '');
    if (!resource) return notFound(label);
    const updated: Resource = { ...resource, ...fields, id: resource.id, name: resource.name };
    if (typeof fields['name'] === 'string') updated.name = fields['name'];
    store.set(resource.id, updated);
    return { status: 200, body: updated };
  }

  private remove(store: Map<string, Resource>, id: string | undefined, label: string): FakeReply {
    return store.delete(id ?? '') ? { status: 200 } : notFound(label);
  }

  private comment(taskId: string | undefined, body: Record<string, unknown>): FakeReply {
    if (!taskId || !this.tasks.has(taskId)) return notFound('Task');
    const id = this.nextId++;
    const comments = this.comments.get(taskId) ?? [];
    comments.push({ id: String(id), comment_text: body['comment_text'], user: { id: 183, username: 'Sam' } });
    this.comments.set(taskId, comments);
    return { status: 200, body: { id, hist_id: `h${id}`, date: 1700000000000 } };
  }

  private childrenOf(store: Map<string, Resource>, parentKey: string, parentId: string | undefined): Resource[] {
    return [...store.values()].filter((resource) => {
      const parent = resource[parentKey];
      return typeof parent === 'object' && parent !== null && 'id' in parent && parent.id === parentId;
    });
  }
}

function notFound(label: string): FakeReply {
  return { status: 404, body: { err: `${label} not found` } };
}
