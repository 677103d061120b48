import { describe, it, expect, vi } from 'vitest';
import { DuplicateNameError, NotFoundError } from '@inikit/core';
import { Comment } from '../comment';
import {
  AddPropertyCommand,
  AddSectionCommand,
  CommandManager,
  EditPropertyCommand,
  MovePropertyCommand,
  MoveSectionCommand,
  RemovePropertyCommand,
  RemoveSectionCommand,
  SortPropertiesCommand,
  SortSectionsCommand,
} from '../commands';
import { Document } from '../document';
import { Property } from '../property';
import { Section } from '../section';

const names = (items: Iterable<{ name: string }>): string[] => [...items].map(i => i.name);

function sample(): Document {
  const doc = new Document();
  const server = doc.add('server');
  server.add(new Property('port', '8080').withPreComment(' listen port').withComment(' tcp'));
  server.add('host', 'localhost');
  doc.add('client');
  return doc;
}

describe('CommandManager', () => {
  it('undoes and redoes in order', () => {
    const doc = sample();
    const manager = new CommandManager();

    manager.execute(new AddSectionCommand(doc, new Section('extra')));
    expect(names(doc)).toEqual(['server', 'client', 'extra']);
    expect(manager.undoDescription).toBe("Add Section 'extra'");

    expect(manager.undo()).toBe(true);
    expect(names(doc)).toEqual(['server', 'client']);
    expect(manager.canRedo).toBe(true);
    expect(manager.redoDescription).toBe("Add Section 'extra'");

    expect(manager.redo()).toBe(true);
    expect(names(doc)).toEqual(['server', 'client', 'extra']);
    expect(manager.redo()).toBe(false);
  });

  it('clears redo when a new command runs', () => {
    const doc = sample();
    const manager = new CommandManager();
    manager.execute(new AddSectionCommand(doc, new Section('a')));
    manager.undo();
    manager.execute(new AddSectionCommand(doc, new Section('b')));
    expect(manager.canRedo).toBe(false);
  });

  it('drops the oldest command beyond the max depth', () => {
    const doc = new Document();
    const manager = new CommandManager(2);
    for (const name of ['a', 'b', 'c']) {
      manager.execute(new AddSectionCommand(doc, new Section(name)));
    }
    expect(manager.undo()).toBe(true);
    expect(manager.undo()).toBe(true);
    expect(manager.undo()).toBe(false);
    expect(names(doc)).toEqual(['a']);
  });

  it('records nothing when a command throws', () => {
    const doc = sample();
    const manager = new CommandManager();
    expect(() => manager.execute(new RemoveSectionCommand(doc, 'missing'))).toThrow(NotFoundError);
    expect(manager.canUndo).toBe(false);
  });

  it('notifies on every state change', () => {
    const listener = vi.fn();
    const manager = new CommandManager(10, listener);
    manager.execute(new AddSectionCommand(new Document(), new Section('a')));
    manager.undo();
    manager.redo();
    manager.clear();
    expect(listener).toHaveBeenCalledTimes(4);
    expect(manager.canUndo).toBe(false);
  });
});

describe('section commands', () => {
  it('remove restores the section at its old index', () => {
    const doc = sample();
    const server = doc.get('server');
    const command = new RemoveSectionCommand(doc, 'SERVER');
    command.execute();
    expect(names(doc)).toEqual(['client']);
    command.undo();
    expect(names(doc)).toEqual(['server', 'client']);
    expect(doc.get('server')).toBe(server);
  });

  it('move and sort are reversible', () => {
    const doc = sample();
    doc.add('alpha');
    const move = new MoveSectionCommand(doc, 0, 2);
    expect(move.description).toBe("Move Section 'server'");
    move.execute();
    expect(names(doc)).toEqual(['client', 'alpha', 'server']);
    move.undo();
    expect(names(doc)).toEqual(['server', 'client', 'alpha']);

    const sort = new SortSectionsCommand(doc);
    sort.execute();
    expect(names(doc)).toEqual(['alpha', 'client', 'server']);
    sort.undo();
    expect(names(doc)).toEqual(['server', 'client', 'alpha']);
  });
});

describe('property commands', () => {
  it('add and remove keep positions', () => {
    const doc = sample();
    const server = doc.get('server');
    if (!server) throw new Error('fixture');

    const add = new AddPropertyCommand(server, new Property('timeout', '30'), 1);
    add.execute();
    expect(names(server)).toEqual(['port', 'timeout', 'host']);
    add.undo();
    expect(names(server)).toEqual(['port', 'host']);

    const remove = new RemovePropertyCommand(server, 'port');
    remove.execute();
    expect(names(server)).toEqual(['host']);
    remove.undo();
    expect(names(server)).toEqual(['port', 'host']);
  });

  it('edit renames in place and carries comments', () => {
    const doc = sample();
    const server = doc.get('server');
    if (!server) throw new Error('fixture');
    const original = server.get('port');

    const edit = new EditPropertyCommand(server, 'port', { name: 'listen', value: '9090', isQuoted: true });
    expect(edit.description).toBe("Edit Property 'port' to 'listen'");
    edit.execute();

    expect(names(server)).toEqual(['listen', 'host']);
    const listen = server.get('listen');
    expect(listen?.value).toBe('9090');
    expect(listen?.isQuoted).toBe(true);
    expect(listen?.preComments.at(0)?.value).toBe(' listen port');
    expect(listen?.comment?.value).toBe(' tcp');
    expect(listen?.comment).not.toBe(original?.comment);

    edit.undo();
    expect(names(server)).toEqual(['port', 'host']);
    expect(server.get('port')).toBe(original);
  });

  it('edit stores its own copy of a new comment', () => {
    const doc = sample();
    const server = doc.get('server');
    if (!server) throw new Error('fixture');
    const comment = new Comment(' changed');
    new EditPropertyCommand(server, 'host', { comment }).execute();
    comment.value = ' mutated later';
    expect(server.get('host')?.comment?.value).toBe(' changed');

    new EditPropertyCommand(server, 'host', { comment: null }).execute();
    expect(server.get('host')?.comment).toBeNull();
  });

  it('edit refuses to rename onto an existing key', () => {
    const doc = sample();
    const server = doc.get('server');
    if (!server) throw new Error('fixture');
    const edit = new EditPropertyCommand(server, 'port', { name: 'HOST' });
    expect(() => edit.execute()).toThrow(DuplicateNameError);
    expect(names(server)).toEqual(['port', 'host']);
  });

  it('edit may change only the case of a name', () => {
    const doc = sample();
    const server = doc.get('server');
    if (!server) throw new Error('fixture');
    new EditPropertyCommand(server, 'port', { name: 'PORT' }).execute();
    expect(names(server)).toEqual(['PORT', 'host']);
  });

  it('move and sort are reversible', () => {
    const doc = sample();
    const server = doc.get('server');
    if (!server) throw new Error('fixture');
    server.add('alpha', '1');

    const move = new MovePropertyCommand(server, 2, 0);
    move.execute();
    expect(names(server)).toEqual(['alpha', 'port', 'host']);
    move.undo();
    expect(names(server)).toEqual(['port', 'host', 'alpha']);

    const sort = new SortPropertiesCommand(server);
    sort.execute();
    expect(names(server)).toEqual(['alpha', 'host', 'port']);
    sort.undo();
    expect(names(server)).toEqual(['port', 'host', 'alpha']);
  });
});
