import { describe, test, expect, beforeEach } from 'vitest';
import { InMemoryCameraStore } from '../services/cameraStore.service';
import { Camera } from '../models/camera.model';

const silent = { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} };

const makeCamera = (id: string, ipAddress: string): Camera => ({
  id,
  name: `Camera ${id}`,
  model: 'Model A',
  network: { ipAddress },
  imageSettings: { brightness: 50, contrast: 50, saturation: 50 },
  feeds: [{ id: `${id}-feed`, protocol: 'rtsp', port: 554, path: '/' }],
  createdAt: new Date('2026-01-01T00:00:00Z'),
  updatedAt: new Date('2026-01-01T00:00:00Z'),
  lastCheckin: null,
});

describe('InMemoryCameraStore', () => {
  let store: InMemoryCameraStore;

  beforeEach(() => {
    store = new InMemoryCameraStore(silent);
  });

  test('returns undefined for an unknown id', () => {
    expect(store.get('missing')).toBeUndefined();
  });

  test('puts and gets a camera by id', () => {
    store.put(makeCamera('a', '10.0.0.1'));

    const camera = store.get('a');
    expect(camera?.network.ipAddress).toBe('10.0.0.1');
    expect(camera?.createdAt).toEqual(new Date('2026-01-01T00:00:00Z'));
  });

  test('overwrites an existing record without moving it in the listing', () => {
    store.put(makeCamera('a', '10.0.0.1'));
    store.put(makeCamera('b', '10.0.0.2'));
    store.put({ ...makeCamera('a', '10.0.0.1'), name: 'Renamed' });

    const all = store.listAll();
    expect(all.map((camera) => camera.id)).toEqual(['a', 'b']);
    expect(all[0].name).toBe('Renamed');
  });

  test('delete reports whether a record existed', () => {
    store.put(makeCamera('a', '10.0.0.1'));

    expect(store.delete('a')).toBe(true);
    expect(store.delete('a')).toBe(false);
    expect(store.get('a')).toBeUndefined();
  });

  test('lists cameras in insertion order', () => {
    store.put(makeCamera('c', '10.0.0.3'));
    store.put(makeCamera('a', '10.0.0.1'));
    store.put(makeCamera('b', '10.0.0.2'));

    expect(store.listAll().map((camera) => camera.id)).toEqual(['c', 'a', 'b']);
  });

  test('changes to returned records do not reach stored state', () => {
    const original = makeCamera('a', '10.0.0.1');
    store.put(original);
    original.name = 'Changed after put';

    const fetched = store.get('a');
    if (!fetched) {
      throw new Error('expected camera');
    }
    fetched.feeds.push({ id: 'extra', protocol: 'http', port: 8080, path: '/' });
    store.listAll()[0].model = 'Changed in snapshot';

    const again = store.get('a');
    expect(again?.name).toBe('Camera a');
    expect(again?.model).toBe('Model A');
    expect(again?.feeds).toHaveLength(1);
  });
});
