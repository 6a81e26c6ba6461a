import { ConfigService } from '@nestjs/config';
import { ImageGenerationError, ImageGenerationTimeoutError } from '../common/errors/pipeline.errors';
import { AIMessage } from '../libs/messages';
import { VertexImagenService } from './vertex-imagen.service';

jest.mock('google-auth-library', () => ({
	GoogleAuth: class {
		async getClient() {
			return { getAccessToken: async () => ({ token: 'test-token' }) };
		}
	},
}));

const PREDICT_URL =
	'https://us-central1-aiplatform.googleapis.com/v1/projects/test-project/locations/us-central1/publishers/google/models/imagen-3.0-generate-002:predict';

const jsonResponse = (body: unknown, status = 200) =>
	new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('VertexImagenService', () => {
	const createService = (vertex: Record<string, string> = { projectId: 'test-project' }) =>
		new VertexImagenService(
			new ConfigService({
				vertex,
				generator: { timeoutMs: 50 },
			}),
		);

	let fetchSpy: jest.SpiedFunction<typeof fetch>;

	beforeEach(() => {
		fetchSpy = jest.spyOn(global, 'fetch');
	});

	afterEach(() => {
		fetchSpy.mockRestore();
	});

	it('returns the base64 bytes of the first prediction', async () => {
		fetchSpy.mockResolvedValueOnce(jsonResponse({ predictions: [{ bytesBase64Encoded: 'aGVsbG8=' }] }));

		await expect(createService().generateImage('  a shoe on a trail ')).resolves.toEqual({ data: 'aGVsbG8=' });

		expect(fetchSpy).toHaveBeenCalledTimes(1);
		const [url, init] = fetchSpy.mock.calls[0];
		expect(url).toBe(PREDICT_URL);
		expect(init?.headers).toEqual({ Authorization: 'Bearer test-token', 'Content-Type': 'application/json' });
		const body: unknown = JSON.parse(String(init?.body));
		expect(body).toMatchObject({
			instances: [{ prompt: 'a shoe on a trail' }],
			parameters: { sampleCount: 1, aspectRatio: '1:1' },
		});
	});

	it('reports the API error message of a failed response', async () => {
		fetchSpy.mockResolvedValueOnce(jsonResponse({ error: { message: 'Permission denied on project' } }, 403));

		await expect(createService().generateImage('a shoe')).rejects.toThrow('Vertex AI error 403: Permission denied on project');
	});

	it('reports a raw error body that is not JSON', async () => {
		fetchSpy.mockResolvedValueOnce(new Response('upstream unavailable', { status: 503 }));

		await expect(createService().generateImage('a shoe')).rejects.toThrow('Vertex AI error 503: upstream unavailable');
	});

	it('reports a prediction removed by the safety filter', async () => {
		fetchSpy.mockResolvedValueOnce(jsonResponse({ predictions: [{ raiFilteredReason: 'contains a person' }] }));

		await expect(createService().generateImage('a shoe')).rejects.toThrow('Image filtered by safety: contains a person');
	});

	it('reports a response-level safety filter', async () => {
		fetchSpy.mockResolvedValueOnce(jsonResponse({ raiFilteredReason: 'prompt blocked' }));

		await expect(createService().generateImage('a shoe')).rejects.toThrow('Image filtered by safety: prompt blocked');
	});

	it('rejects a prediction without image bytes', async () => {
		fetchSpy.mockResolvedValueOnce(jsonResponse({ predictions: [{}] }));

		const error = await createService()
			.generateImage('a shoe')
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ImageGenerationError);
		expect(error instanceof Error && error.message).toBe('Vertex AI returned no image');
	});

	it('times out a request that never answers', async () => {
		fetchSpy.mockImplementationOnce(
			(_url, init) =>
				new Promise<Response>((_resolve, reject) => {
					init?.signal?.addEventListener('abort', () => reject(Object.assign(new Error('aborted'), { name: 'AbortError' })));
				}),
		);

		const error = await createService()
			.generateImage('a shoe')
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ImageGenerationTimeoutError);
		expect(error instanceof Error && error.message).toBe('Vertex Imagen request timed out after 0.05s');
	});

	it('wraps network failures', async () => {
		fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

		await expect(createService().generateImage('a shoe')).rejects.toThrow('Vertex Imagen error: fetch failed');
	});

	it('requires a project id before calling the API', async () => {
		await expect(createService({}).generateImage('a shoe')).rejects.toThrow(AIMessage.VERTEX_PROJECT_MISSING);
		expect(fetchSpy).not.toHaveBeenCalled();
	});

	it('requires a prompt', async () => {
		await expect(createService().generateImage('   ')).rejects.toThrow('Prompt is required');
		expect(fetchSpy).not.toHaveBeenCalled();
	});
});
