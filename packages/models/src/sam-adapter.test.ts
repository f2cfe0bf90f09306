import { beforeEach, describe, expect, it, vi } from 'vitest';
import type {
  BackendSession,
  DebugTextPrinter,
  ImageRaster,
  Polygon,
  SamBackend,
} from '@sam-adapter/types';
import {
  BackendRuntimeError,
  EMPTY_POLYGON,
  InterruptedError,
  MissingArtifactError,
} from '@sam-adapter/core';
import { SamAdapter, createSamModel } from './sam-adapter';
import { EFFICIENT_SAM } from './model-families';

const TRIANGLE: Polygon = [{ x: 1, y: 1 }, { x: 8, y: 1 }, { x: 4, y: 6 }];
const SQUARE: Polygon = [{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 2 }, { x: 0, y: 2 }];

function createImage(): ImageRaster {
  return { data: new Uint8Array(4 * 6 * 3), shape: [4, 6, 3], axes: 'yxc' };
}

function createMockLogger() {
  return { info: vi.fn(), error: vi.fn() };
}

function createMockSession(result: Polygon[] = [TRIANGLE]) {
  return {
    inferFromPoints: vi.fn<BackendSession['inferFromPoints']>().mockResolvedValue(result),
    inferFromBox: vi.fn<BackendSession['inferFromBox']>().mockResolvedValue(result),
    inferFromMask: vi.fn<BackendSession['inferFromMask']>().mockResolvedValue(result),
    close: vi.fn<BackendSession['close']>(),
  } satisfies BackendSession;
}

function createMockBackend(session: BackendSession) {
  return {
    initialize: vi.fn<SamBackend['initialize']>().mockResolvedValue(session),
  } satisfies SamBackend;
}

describe('SamAdapter', () => {
  let session: ReturnType<typeof createMockSession>;
  let backend: ReturnType<typeof createMockBackend>;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    session = createMockSession();
    backend = createMockBackend(session);
    logger = createMockLogger();
  });

  async function activeModel(): Promise<SamAdapter> {
    return createSamModel(EFFICIENT_SAM, backend).construct(createImage(), logger);
  }

  describe('identity', () => {
    it('reports the family name, description and axes', () => {
      const model = createSamModel(EFFICIENT_SAM, backend);

      expect(model.getName()).toBe('EfficientSAM');
      expect(model.getDescription()).toBe(EFFICIENT_SAM.description);
      expect(model.getInputImageAxes()).toBe('yxc');
      expect(model.getDescriptor()).toBe(EFFICIENT_SAM);
    });
  });

  describe('installation flag', () => {
    it('defaults to not installed', () => {
      expect(createSamModel(EFFICIENT_SAM, backend).isInstalled()).toBe(false);
    });

    it('reflects setInstalled', () => {
      const model = createSamModel(EFFICIENT_SAM, backend);
      model.setInstalled(true);
      expect(model.isInstalled()).toBe(true);
      model.setInstalled(false);
      expect(model.isInstalled()).toBe(false);
    });

    it('is independent between instances', () => {
      const a = createSamModel(EFFICIENT_SAM, backend);
      const b = createSamModel(EFFICIENT_SAM, backend);
      a.setInstalled(true);
      expect(b.isInstalled()).toBe(false);
    });

    it('is carried over to a constructed model', async () => {
      const model = createSamModel(EFFICIENT_SAM, backend);
      model.setInstalled(true);
      const active = await model.construct(createImage(), logger);
      expect(active.isInstalled()).toBe(true);
    });
  });

  describe('construct', () => {
    it('binds a session to the image', async () => {
      const image = createImage();
      const model = createSamModel(EFFICIENT_SAM, backend);

      const active = await model.construct(image, logger);

      expect(active).not.toBe(model);
      expect(active.isActive()).toBe(true);
      expect(model.isActive()).toBe(false);
      expect(backend.initialize).toHaveBeenCalledOnce();
      expect(backend.initialize.mock.calls[0][0]).toBe(image);
    });

    it('passes the session options through', async () => {
      const controller = new AbortController();
      await createSamModel(EFFICIENT_SAM, backend).construct(createImage(), logger, {
        signal: controller.signal,
      });
      expect(backend.initialize.mock.calls[0][2]).toEqual({ signal: controller.signal });
    });

    it('filters contour dumps out of backend text', async () => {
      await activeModel();
      const debugSink: DebugTextPrinter = backend.initialize.mock.calls[0][1];

      debugSink('inference done contours_x=[[1,2]]');
      debugSink('encoder ready');

      expect(logger.info).toHaveBeenNthCalledWith(1, 'inference done ');
      expect(logger.info).toHaveBeenNthCalledWith(2, 'encoder ready');
    });

    it.each([
      ['missing artifact', new MissingArtifactError('no weights', '/env/weights/efficient-sam.pt')],
      ['backend runtime', new BackendRuntimeError('torch failed to load')],
      ['interruption', new InterruptedError()],
    ])('propagates %s failures', async (_kind, failure) => {
      backend.initialize.mockRejectedValue(failure);
      await expect(
        createSamModel(EFFICIENT_SAM, backend).construct(createImage(), logger),
      ).rejects.toBe(failure);
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe('instantiate', () => {
    it('returns an active model on success', async () => {
      const active = await createSamModel(EFFICIENT_SAM, backend).instantiate(createImage(), logger);
      expect(active?.isActive()).toBe(true);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it.each([
      ['missing artifact', new MissingArtifactError('Required backend file is missing: /env/sam_worker.py')],
      ['backend runtime', new BackendRuntimeError('encoder crashed')],
      ['interruption', new InterruptedError('Interrupted before the backend process started')],
    ])('logs %s failures once and returns null', async (_kind, failure) => {
      backend.initialize.mockRejectedValue(failure);

      const result = await createSamModel(EFFICIENT_SAM, backend).instantiate(createImage(), logger);

      expect(result).toBeNull();
      expect(logger.error).toHaveBeenCalledOnce();
      expect(logger.error).toHaveBeenCalledWith(`EfficientSAM experienced an error: ${failure.message}`);
    });
  });

  describe('fetch2dSegmentationFromPoints', () => {
    it('uses the points-only entry point without negative points', async () => {
      const model = await activeModel();

      const result = await model.fetch2dSegmentationFromPoints([{ position: [10.7, 20.2] }], []);

      expect(session.inferFromPoints).toHaveBeenCalledOnce();
      expect(session.inferFromPoints.mock.calls[0]).toEqual([[[10, 20]]]);
      expect(result).toEqual([TRIANGLE]);
    });

    it('uses the dual-list entry point with negative points', async () => {
      const model = await activeModel();

      await model.fetch2dSegmentationFromPoints(
        [{ position: [4.9, 2.1] }, { position: [7, 8] }],
        [{ position: [1.5, 1.5] }],
      );

      expect(session.inferFromPoints.mock.calls[0]).toEqual([
        [[4, 2], [7, 8]],
        [[1, 1]],
      ]);
    });

    it('returns the backend polygons unmodified', async () => {
      session.inferFromPoints.mockResolvedValue([TRIANGLE, SQUARE]);
      const model = await activeModel();

      const result = await model.fetch2dSegmentationFromPoints([{ position: [1, 1] }], []);

      expect(result).toHaveLength(2);
      expect(result[0]).toBe(TRIANGLE);
      expect(result[1]).toBe(SQUARE);
    });

    it('returns no polygons when the backend finds none', async () => {
      session.inferFromPoints.mockResolvedValue([]);
      const model = await activeModel();

      expect(await model.fetch2dSegmentationFromPoints([{ position: [1, 1] }], [])).toEqual([]);
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe('fetch2dSegmentationFromBox', () => {
    it('sends the box as x0, y0, x1, y1', async () => {
      const model = await activeModel();

      const result = await model.fetch2dSegmentationFromBox({ min: [3, 7], max: [20, 15] });

      expect(session.inferFromBox).toHaveBeenCalledWith([3, 7, 20, 15]);
      expect(result).toEqual([TRIANGLE]);
    });
  });

  describe('fetch2dSegmentationFromMask', () => {
    it('forwards the raster as is', async () => {
      const model = await activeModel();
      const mask = { data: new Float32Array(24), width: 6, height: 4 };

      await model.fetch2dSegmentationFromMask(mask);

      expect(session.inferFromMask).toHaveBeenCalledWith(mask);
    });
  });

  describe('failure containment', () => {
    const failures = [
      new MissingArtifactError('weights vanished'),
      new BackendRuntimeError('CUDA out of memory'),
      new InterruptedError(),
    ];

    it.each(failures)('returns [EMPTY_POLYGON] for every entry point on %s', async (failure) => {
      session.inferFromPoints.mockRejectedValue(failure);
      session.inferFromBox.mockRejectedValue(failure);
      session.inferFromMask.mockRejectedValue(failure);
      const model = await activeModel();

      const results = [
        await model.fetch2dSegmentationFromPoints([{ position: [1, 1] }], []),
        await model.fetch2dSegmentationFromPoints([{ position: [1, 1] }], [{ position: [2, 2] }]),
        await model.fetch2dSegmentationFromBox({ min: [0, 0], max: [3, 3] }),
        await model.fetch2dSegmentationFromMask({ data: new Uint8Array(24), width: 6, height: 4 }),
      ];

      for (const result of results) {
        expect(result).toHaveLength(1);
        expect(result[0]).toBe(EMPTY_POLYGON);
        expect(result[0]).toHaveLength(0);
      }
      expect(logger.error).toHaveBeenCalledTimes(4);
      expect(logger.error).toHaveBeenCalledWith(
        `EfficientSAM, providing empty result because of some trouble: ${failure.message}`,
      );
    });

    it('contains invalid prompts', async () => {
      const model = await activeModel();

      const result = await model.fetch2dSegmentationFromPoints([{ position: [1] }], []);

      expect(result).toEqual([EMPTY_POLYGON]);
      expect(session.inferFromPoints).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith(
        'EfficientSAM, providing empty result because of some trouble: Expected at least 2 dimensions, got 1',
      );
    });

    it('rejects segmentation on an uninstantiated model', async () => {
      const model = new SamAdapter(EFFICIENT_SAM, backend, logger);

      const result = await model.fetch2dSegmentationFromBox({ min: [0, 0], max: [1, 1] });

      expect(result).toEqual([EMPTY_POLYGON]);
      expect(logger.error).toHaveBeenCalledWith(
        'EfficientSAM, providing empty result because of some trouble: EfficientSAM has not been instantiated for an image',
      );
    });
  });

  describe('closing', () => {
    it('closes the session once even when called twice', async () => {
      const model = await activeModel();

      model.closeProcess();
      model.closeProcess();

      expect(session.close).toHaveBeenCalledOnce();
      expect(model.isActive()).toBe(false);
    });

    it('rejects segmentation after close without reaching the session', async () => {
      const model = await activeModel();
      model.closeProcess();

      const result = await model.fetch2dSegmentationFromBox({ min: [3, 7], max: [20, 15] });

      expect(result).toEqual([EMPTY_POLYGON]);
      expect(session.inferFromBox).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith(
        'EfficientSAM, providing empty result because of some trouble: EfficientSAM has been closed',
      );
    });

    it('logs and closes when the UI is closed', async () => {
      const model = await activeModel();

      model.notifyUiHasBeenClosed();

      expect(logger.info).toHaveBeenCalledWith('EfficientSAM: closing the backend process');
      expect(session.close).toHaveBeenCalledOnce();
    });

    it('tolerates repeated UI-closed notifications', async () => {
      const model = await activeModel();

      model.notifyUiHasBeenClosed();
      model.notifyUiHasBeenClosed();

      expect(logger.info).toHaveBeenCalledTimes(2);
      expect(session.close).toHaveBeenCalledOnce();
    });
  });
});
