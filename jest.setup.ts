import nock from 'nock';
import { getLogger } from './src/utils/logger';

// Tests never reach the network; HTTP-level tests declare their interceptors with nock
nock.disableNetConnect();

getLogger().setOutputStream(() => {});
