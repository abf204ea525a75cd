import { Types } from 'mongoose';
import { makeCourse, makeLesson, makeModule } from '../../../../test/fakes/catalog.fake';
import { buildCurriculum } from './course-module.controller';

describe('buildCurriculum', () => {
  it('groups lessons under their modules in order and counts them', () => {
    const course = makeCourse(new Types.ObjectId());
    const first = makeModule(course, { title: 'Primero', sortIndex: 0 });
    const second = makeModule(course, { title: 'Segundo', sortIndex: 1 });
    const empty = makeModule(course, { title: 'Vacío', sortIndex: 2 });
    const a = makeLesson(first, { title: 'a', sortIndex: 1 });
    const b = makeLesson(first, { title: 'b', sortIndex: 0 });
    const c = makeLesson(second, { title: 'c', sortIndex: 0 });

    const res = buildCurriculum(course, [second, empty, first], [a, c, b]);

    expect(res.courseId).toBe(course._id.toHexString());
    expect(res.totalModules).toBe(3);
    expect(res.totalLessons).toBe(3);
    expect(res.modules.map((m) => m.title)).toEqual(['Primero', 'Segundo', 'Vacío']);
    expect(res.modules[0].lessons.map((l) => l.title)).toEqual(['b', 'a']);
    expect(res.modules.map((m) => m.totalLessons)).toEqual([2, 1, 0]);
  });
});
