/**
 * Service Factory - composes the entity services over one store
 */

import type { Store } from '../database/store.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger } from '../utils/logger.js';
import { BoardService } from './BoardService.js';
import { FileSystemImageStorage, type ImageStorage } from './ImageStorage.js';
import { LabelService } from './LabelService.js';
import { ListService } from './ListService.js';
import { ProjectService } from './ProjectService.js';
import { TaskService } from './TaskService.js';

const logger = createModuleLogger('ServiceFactory');

export interface ServiceContainer {
  store: Store;
  projectService: ProjectService;
  boardService: BoardService;
  labelService: LabelService;
  listService: ListService;
  taskService: TaskService;
}

export interface ServiceFactoryConfig {
  store: Store;
  images?: ImageStorage | undefined;
}

export function createServices(config: ServiceFactoryConfig): ServiceContainer {
  const { store } = config;
  const images = config.images ?? new FileSystemImageStorage(cfg.MEDIA_ROOT);

  logger.debug('Creating services');

  return {
    store,
    projectService: new ProjectService(store, images),
    boardService: new BoardService(store),
    labelService: new LabelService(store),
    listService: new ListService(store),
    taskService: new TaskService(store),
  };
}
