import { run } from './main';

// run() reports every failure through core.setFailed
void run();
