import { ListNodeValue } from '../types';
import { DxfEntity } from './entity';
import { OwnedList } from './owned-list';

/**
 * Whole-list teardown. `onNode` releases whatever each node owns.
 */
export function freeList<T>(list: OwnedList<T>, onNode?: (value: T) => void): void {
  list.release(onNode);
}

/**
 * Release an entity whose lists are already released (or empty) and whose chain link is cleared.
 * Throws OwnershipError and leaves the entity live otherwise.
 */
export function freeEntity(entity: DxfEntity): void {
  entity.release();
}

function clearNode(node: ListNodeValue): void {
  for (const key of Object.keys(node)) {
    delete node[key];
  }
}

/**
 * Release every repeated list of the entity, then the entity itself
 */
export function freeEntityDeep(entity: DxfEntity): void {
  for (const list of entity.ownedLists()) {
    if (!list.isReleased) freeList(list, clearNode);
  }
  freeEntity(entity);
}
