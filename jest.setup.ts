// Decorated Nest and TypeORM classes read metadata at import time
import 'reflect-metadata';
